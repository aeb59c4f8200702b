import { Command, Option } from "clipanion";
import { inspectText } from "../../moderation/lexical.js";

const yesNo = (value: boolean) => (value ? "yes" : "no");

export class CheckCommand extends Command {
  static override paths = [["check"]];

  static override usage = Command.Usage({
    description: "Run the phrase-list checks against a text without calling any service",
    examples: [
      ["Check a message", "tonewatch check 'isso não vai ficar assim'"],
    ],
  });

  words = Option.Rest({ required: 1 });

  async execute(): Promise<number> {
    const text = this.words.join(" ");
    const report = inspectText(text);

    this.context.stdout.write(
      `Legal justification: ${yesNo(report.legalJustification)}\n` +
        `Explicit threat:     ${yesNo(report.explicitThreat)}\n` +
        `Abusive language:    ${yesNo(report.abusive)}\n`,
    );
    for (const phrase of report.matched) {
      this.context.stdout.write(`  matched: "${phrase}"\n`);
    }

    return 0;
  }
}
