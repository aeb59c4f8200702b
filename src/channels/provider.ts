import type { HistoryMessage } from "../moderation/types.js";

export interface HistoryRequest {
  readonly channel: string;
  /** Upper bound timestamp of the window. */
  readonly latest: string;
  readonly limit: number;
  readonly inclusive: boolean;
}

export type HistoryResult =
  | { readonly ok: true; readonly messages: HistoryMessage[] }
  | {
      readonly ok: false;
      /** 429 when rate limited; the HTTP status otherwise, or 200 for a platform-level error. */
      readonly status: number;
      readonly error: string;
      readonly retryAfterSec?: number;
    };

export type PostResult =
  | { readonly ok: true; readonly ts: string }
  | { readonly ok: false; readonly error: string };

/** Newest-first history access and message posting for one chat workspace. */
export interface ChatProvider {
  fetchHistory(request: HistoryRequest): Promise<HistoryResult>;
  postMessage(channel: string, text: string): Promise<PostResult>;
}
