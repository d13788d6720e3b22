import { confirm as confirmPrompt, select as selectPrompt } from '@inquirer/prompts';

export interface SelectChoice<T> {
  name: string;
  value: T;
  description?: string;
}

/** The prompts the tools ask; tests substitute a scripted adapter. */
export interface PromptAdapter {
  select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    pageSize?: number;
    defaultValue?: T;
  }): Promise<T>;
  confirm(options: {
    message: string;
    defaultValue?: boolean;
  }): Promise<boolean>;
}

export const interactivePromptAdapter: PromptAdapter = {
  async select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    pageSize?: number;
    defaultValue?: T;
  }): Promise<T> {
    return selectPrompt({
      message: options.message,
      choices: options.choices,
      pageSize: options.pageSize,
      default: options.defaultValue
    });
  },

  async confirm(options): Promise<boolean> {
    return confirmPrompt({
      message: options.message,
      default: options.defaultValue
    });
  }
};
