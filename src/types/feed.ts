export type FeedEntry = {
  updated: string; // e.g. 2026-10-18T00:00:00Z
  summary: string; // html fragment with one <li> per event
  title?: string;
};

export type EventImage = {
  url: string;
  altText: string | null;
};

export type EventRecord = {
  text: string;
  year: number;
  links: string[]; // fully qualified, document order
  yearLink: string | null;
  image: EventImage | null;
};

export type FormattedPost = {
  text: string;
  image: EventImage | null;
};

export type ImagePayload = {
  bytes: ArrayBuffer;
  filename: string;
  description: string | null;
};
