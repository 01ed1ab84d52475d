/**
 * Prompt Port
 *
 * The setup run asks two kinds of question: yes/no (show the Apps Script
 * instructions?) and free text (the web-app URL). Callers check
 * `interactive` first and skip the question when nobody can answer.
 */

export interface TextPromptOptions {
  initial?: string;
  placeholder?: string;
  /** Returns the hint to show for a rejected answer, undefined to accept */
  validate?: (value: string) => string | undefined;
}

export interface PromptPort {
  readonly interactive: boolean;

  confirm(message: string, initial?: boolean): Promise<boolean>;

  text(message: string, options?: TextPromptOptions): Promise<string>;
}
