/**
 * PromptPort on @clack/prompts. Ctrl-C at a question ends the whole run
 * the same way typing `q` at the URL prompt does.
 */

import { cancel, confirm, isCancel, text } from '@clack/prompts';
import type { PromptPort } from '../core/ports/prompt.js';
import { UserCancellationError } from '../utils/errors.js';

function answered<T>(value: T | symbol): T {
  if (isCancel(value) || typeof value === 'symbol') {
    cancel('riverSpider setup cancelled.');
    throw new UserCancellationError('Setup cancelled by user.');
  }
  return value;
}

export function createClackPrompt(): PromptPort {
  return {
    interactive: true,

    async confirm(message, initial = false) {
      return answered(await confirm({ message, initialValue: initial }));
    },

    async text(message, options = {}) {
      const { validate } = options;
      const value = await text({
        message,
        placeholder: options.placeholder,
        defaultValue: options.initial,
        validate: validate ? input => validate(input ?? '') : undefined
      });
      return answered(value);
    }
  };
}
