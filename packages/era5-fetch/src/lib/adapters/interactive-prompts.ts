import prompts from "prompts";
import type { PromptService } from "../ports/prompt.js";

/**
 * Terminal prompts backed by the `prompts` package.
 */
export const interactivePrompts: PromptService = {
  async text(message: string, initial?: string): Promise<string | undefined> {
    const { value } = await prompts({
      type: "text",
      name: "value",
      message,
      initial,
    });
    return typeof value === "string" ? value : undefined;
  },

  async password(message: string): Promise<string | undefined> {
    const { value } = await prompts({
      type: "password",
      name: "value",
      message,
    });
    return typeof value === "string" ? value : undefined;
  },
};
