import axios from "axios";
import type { AxiosInstance } from "axios";
import type { MastodonConfig } from "../jobs/config";
import { buildImagePayload } from "../jobs/format";
import type { FetchBytes } from "../jobs/format";
import type { FormattedPost, ImagePayload } from "../types/feed";
import { logger } from "./logger";

export interface Publisher {
  /** Post the toot and return its status id */
  publish(post: FormattedPost): Promise<string>;
}

type MediaAttachment = { id: string };
type Status = { id: string; url?: string | null };

/** Plain download through axios; the image host needs no auth */
export const fetchImageBytes: FetchBytes = async (url) => {
  const { data } = await axios.get<ArrayBuffer>(url, {
    responseType: "arraybuffer",
    timeout: 20_000,
  });
  return data;
};

export function createMastodonHttp(config: MastodonConfig): AxiosInstance {
  return axios.create({
    baseURL: config.baseUrl,
    timeout: 20_000,
    headers: { Authorization: `Bearer ${config.accessToken}` },
  });
}

export async function uploadMedia(http: AxiosInstance, payload: ImagePayload) {
  const form = new FormData();
  form.append("file", new Blob([payload.bytes]), payload.filename);
  if (payload.description) form.append("description", payload.description);
  const { data } = await http.post<MediaAttachment>("/api/v2/media", form);
  return data.id;
}

export function createMastodonPublisher(
  config: MastodonConfig,
  deps: { http?: AxiosInstance; fetchBytes?: FetchBytes } = {}
): Publisher {
  const http = deps.http ?? createMastodonHttp(config);
  const fetchBytes = deps.fetchBytes ?? fetchImageBytes;

  return {
    async publish(post) {
      const mediaIds: string[] = [];
      if (post.image) {
        const payload = await buildImagePayload(post.image, fetchBytes);
        mediaIds.push(await uploadMedia(http, payload));
        logger.info({ url: post.image.url, media: mediaIds[0] }, "[mastodon] media uploaded");
      }

      const { data } = await http.post<Status>("/api/v1/statuses", {
        status: post.text,
        visibility: config.visibility,
        media_ids: mediaIds,
      });
      logger.info({ id: data.id, url: data.url }, "[mastodon] status posted");
      return data.id;
    },
  };
}
