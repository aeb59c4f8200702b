import { z } from "zod";
import type { ConversationsHistoryResponse } from "@slack/web-api";
import type { HistoryMessage, ModerationMessage } from "../../moderation/types.js";

type SlackHistoryElement = NonNullable<ConversationsHistoryResponse["messages"]>[number];

export const slackMessageEventSchema = z
  .object({
    type: z.string(),
    subtype: z.string().optional(),
    bot_id: z.string().optional(),
    user: z.string().optional(),
    text: z.string().optional(),
    ts: z.string().optional(),
    thread_ts: z.string().optional(),
    channel: z.string().optional(),
    channel_type: z.string().optional(),
  })
  .passthrough();

export type SlackMessageEvent = z.infer<typeof slackMessageEventSchema>;

export const slackEnvelopeSchema = z
  .object({
    type: z.string().optional(),
    token: z.string().optional(),
    challenge: z.string().optional(),
    team_id: z.string().optional(),
    event_id: z.string().optional(),
    event: slackMessageEventSchema.optional(),
  })
  .passthrough();

export type SlackEnvelope = z.infer<typeof slackEnvelopeSchema>;

/** Subtypes that are not a new message written by a person (edits, deletions, membership and channel changes). */
const IGNORED_SUBTYPES: ReadonlySet<string> = new Set([
  "bot_message",
  "message_changed",
  "message_deleted",
  "message_replied",
  "channel_join",
  "channel_leave",
  "channel_topic",
  "channel_purpose",
  "channel_name",
  "channel_archive",
  "channel_unarchive",
  "group_join",
  "group_leave",
  "group_topic",
  "group_purpose",
  "group_name",
  "group_archive",
  "group_unarchive",
  "pinned_item",
  "unpinned_item",
  "ekm_access_denied",
  "tombstone",
]);

export function normalizeSlackEvent(
  event: SlackMessageEvent | undefined,
): ModerationMessage | null {
  if (!event || event.type !== "message") return null;
  if (event.bot_id) return null;
  if (event.subtype && IGNORED_SUBTYPES.has(event.subtype)) return null;
  if (!event.user || !event.channel || !event.ts) return null;
  if (!event.text || event.text.trim().length === 0) return null;

  return {
    ts: event.ts,
    channel: event.channel,
    userId: event.user,
    text: event.text,
    isBot: false,
  };
}

export function normalizeHistoryMessage(message: SlackHistoryElement): HistoryMessage {
  return {
    ts: message.ts ?? "",
    userId: message.user,
    text: message.text,
    botId: message.bot_id,
    subtype: message.subtype,
  };
}
