/**
 * Questions asked by `auth login` when a flag is missing.
 */
export interface PromptService {
  /** Plain answer, with an optional pre-filled value */
  text(message: string, initial?: string): Promise<string | undefined>;
  /** Hidden answer for API keys */
  password(message: string): Promise<string | undefined>;
}
