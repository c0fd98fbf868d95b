import type { EventImage, EventRecord, FormattedPost, ImagePayload } from "../types/feed";

export function yearsAgoLine(record: EventRecord, today: Date) {
  return `Heute vor ${today.getFullYear() - record.year} Jahren:`;
}

/** Render an event as toot text, plus the image to attach (if any) */
export function formatPost(record: EventRecord, today: Date): FormattedPost {
  const parts = [yearsAgoLine(record, today), record.text];
  if (record.links.length > 0) parts.push(record.links[0]);
  return {
    text: parts.join("\n\n"),
    image: record.image,
  };
}

export function imageFilename(url: string) {
  const path = url.split(/[?#]/)[0];
  const ext = path.includes(".") ? path.split(".").pop() : undefined;
  return ext && /^[a-z0-9]{1,5}$/i.test(ext) ? `image.${ext}` : "image";
}

export type FetchBytes = (url: string) => Promise<ArrayBuffer>;

/** Download the image so it can be uploaded alongside the toot */
export async function buildImagePayload(
  image: EventImage,
  fetchBytes: FetchBytes
): Promise<ImagePayload> {
  return {
    bytes: await fetchBytes(image.url),
    filename: imageFilename(image.url),
    description: image.altText,
  };
}
