import path from "node:path";
import { fileURLToPath } from "node:url";
import { Liquid, Tag, type ParseStream, type TagToken, type TopLevelToken, type Template } from "liquidjs";
import type { Context, Emitter } from "liquidjs";

export type PromptRole = "system" | "user" | "assistant";

export interface PromptMessage {
  role: PromptRole;
  content: string;
}

const ROLES: readonly PromptRole[] = ["system", "user", "assistant"];

/**
 * Custom {% chat role: "system"|"user"|"assistant" %} ... {% endchat %} tag.
 * Emits delimiters that renderPrompt splits on to produce PromptMessage[].
 */
class ChatTag extends Tag {
  private role: string;
  private templates: Template[];

  constructor(token: TagToken, remainTokens: TopLevelToken[], liquid: Liquid) {
    super(token, remainTokens, liquid);
    const match = token.args.match(/role:\s*"(\w+)"/);
    if (!match) {
      throw new Error(`{% chat %} requires role: "system"|"user"|"assistant"`);
    }
    this.role = match[1];
    this.templates = [];
    const stream: ParseStream<TopLevelToken> = liquid.parser
      .parseStream(remainTokens)
      .on("tag:endchat", () => stream.stop())
      .on("template", (tpl: Template) => this.templates.push(tpl))
      .on("end", () => {
        throw new Error("{% chat %} missing {% endchat %}");
      });
    stream.start();
  }

  *render(ctx: Context, emitter: Emitter): Generator<unknown, void, unknown> {
    emitter.write(`\x01CHAT:${this.role}\x01`);
    yield this.liquid.renderer.renderTemplates(this.templates, ctx, emitter);
    emitter.write(`\x01ENDCHAT\x01`);
  }
}

const PROMPTS_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../prompts"
);

const engine = new Liquid({
  root: [PROMPTS_DIR],
  extname: ".liquid",
  strictVariables: false,
});

engine.registerTag("chat", ChatTag);

/**
 * Render a .liquid prompt template and return structured PromptMessage[].
 * The template must use {% chat role: "..." %} blocks.
 */
export async function renderPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<PromptMessage[]> {
  const raw = await engine.renderFile(templateName, context);
  return parseMessages(raw);
}

function parseMessages(raw: string): PromptMessage[] {
  const messages: PromptMessage[] = [];
  const chatRegex = /\x01CHAT:(\w+)\x01([\s\S]*?)\x01ENDCHAT\x01/g;
  let match: RegExpExecArray | null;

  while ((match = chatRegex.exec(raw)) !== null) {
    const roleName = match[1];
    const role = ROLES.find((r) => r === roleName);
    if (!role) {
      throw new Error(`Unknown chat role "${roleName}"`);
    }
    messages.push({ role, content: match[2].trim() });
  }

  return messages;
}
