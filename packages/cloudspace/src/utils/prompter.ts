import * as clack from '@clack/prompts';

export const CANCELLED: unique symbol = Symbol('cancelled');
export type Cancelled = typeof CANCELLED;

export interface PromptOption<T extends string> {
  value: T;
  label?: string;
  hint?: string;
}

export interface TextPromptOptions {
  placeholder?: string;
  defaultValue?: string;
}

/**
 * The handful of prompts the wizard needs. Every prompt resolves to
 * `CANCELLED` when the operator backs out (Ctrl-C or Esc).
 */
export interface Prompter {
  select<T extends string>(
    message: string,
    options: PromptOption<T>[],
    initialValue?: T,
  ): Promise<T | Cancelled>;
  text(message: string, options?: TextPromptOptions): Promise<string | Cancelled>;
  confirm(message: string, initialValue: boolean): Promise<boolean | Cancelled>;
  note(message: string, title?: string): void;
}

export function isCancelled(value: unknown): value is Cancelled {
  return value === CANCELLED;
}

export const clackPrompter: Prompter = {
  async select<T extends string>(
    message: string,
    options: PromptOption<T>[],
    initialValue?: T,
  ): Promise<T | Cancelled> {
    const choices: PromptOption<string>[] = options.map((option) => ({
      value: option.value,
      label: option.label,
      hint: option.hint,
    }));
    const result = await clack.select<PromptOption<string>[], string>({
      message,
      options: choices,
      initialValue,
    });
    if (clack.isCancel(result)) {
      return CANCELLED;
    }
    const selected = options.find((option) => option.value === result);
    return selected ? selected.value : CANCELLED;
  },

  async text(message, options = {}) {
    const result = await clack.text({
      message,
      placeholder: options.placeholder,
      defaultValue: options.defaultValue,
    });
    return clack.isCancel(result) ? CANCELLED : result;
  },

  async confirm(message, initialValue) {
    const result = await clack.confirm({ message, initialValue });
    return clack.isCancel(result) ? CANCELLED : result;
  },

  note(message, title) {
    clack.note(message, title);
  },
};
