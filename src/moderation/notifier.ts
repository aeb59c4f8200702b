import type { ChatProvider } from "../channels/provider.js";
import type { Logger } from "../logging/logger.js";
import type { RuleId, WarningAction } from "./types.js";

type WarningTemplate = (mention: string) => string;

const EXPLICIT_THREAT: WarningTemplate = (u) =>
  `:rotating_light: ${u}, sua mensagem contém uma ameaça explícita. Esse tipo de linguagem não é apropriado.`;
const IMPLICIT_THREAT: WarningTemplate = (u) =>
  `:warning: ${u}, sua mensagem pode conter uma ameaça explícita ou implícita. Por favor, reconsidere o tom.`;
const THREAT: WarningTemplate = (u) =>
  `:rotating_light: ${u}, sua mensagem contém uma ameaça. Esse tipo de linguagem não é apropriado.`;
const COERCIVE: WarningTemplate = (u) =>
  `:warning: ${u}, sua mensagem contém autoridade excessiva. Por favor, mantenha o respeito.`;
const ABUSIVE: WarningTemplate = (u) =>
  `:warning: ${u}, sua mensagem contém linguagem abusiva ou ofensiva. Por favor, mantenha o respeito.`;

const TEMPLATES_BY_RULE: Partial<Record<RuleId, WarningTemplate>> = {
  "explicit-threat": EXPLICIT_THREAT,
  "implicit-threat": IMPLICIT_THREAT,
};

const TEMPLATES_BY_KIND = {
  threat: THREAT,
  coercive: COERCIVE,
  abusive: ABUSIVE,
} as const;

export function formatWarning(action: WarningAction): string | null {
  if (action.kind === "none") return null;
  const template = TEMPLATES_BY_RULE[action.rule] ?? TEMPLATES_BY_KIND[action.kind];
  return template(`<@${action.userId}>`);
}

export class Notifier {
  constructor(
    private readonly provider: Pick<ChatProvider, "postMessage">,
    private readonly logger: Logger,
  ) {}

  /** Single delivery attempt. Returns whether the provider accepted the message. */
  async notify(channel: string, text: string): Promise<boolean> {
    try {
      const result = await this.provider.postMessage(channel, text);
      if (!result.ok) {
        this.logger.error({ channel, error: result.error }, "Failed to post warning");
        return false;
      }
      return true;
    } catch (err) {
      this.logger.error({ err, channel }, "Failed to post warning");
      return false;
    }
  }

  async warn(action: WarningAction): Promise<boolean> {
    const text = formatWarning(action);
    if (!text) return false;

    const sent = await this.notify(action.channel, text);
    if (sent) {
      this.logger.info({ channel: action.channel, user: action.userId, kind: action.kind, rule: action.rule }, "Warning sent");
    }
    return sent;
  }
}
