// pattern: Functional Core

const PERSONA = 'You are an expert macOS terminal and development environment engineer.';

const CONSTRAINTS = `Constraints:
- Respond ONLY with valid shell commands, one per line.
- Do not include explanations, comments, Markdown, or prose.
- Prefer Homebrew for package installation where appropriate.
- Avoid destructive operations (no rm -rf, no disk formatting, no sudo unless clearly necessary and safe).`;

const SEARCH_GUIDANCE =
  'When you need current information (latest versions, recent releases, current documentation), use the web_search tool to find up-to-date information before responding.';

/**
 * The fixed system instruction for tool-calling conversations. Takes no input, so user text
 * can never reach it.
 */
export function buildSystemInstruction(): string {
  return `${PERSONA}\n\n${CONSTRAINTS}\n\n${SEARCH_GUIDANCE}`;
}

/**
 * Single-shot prompt for the generate endpoint, with the request appended after the instructions.
 */
export function buildSingleShotPrompt(userRequest: string): string {
  return `${PERSONA}\n\n${CONSTRAINTS}\n\nUser request:\n${userRequest}`;
}
