import { select as selectPrompt } from '@inquirer/prompts';

export interface SelectChoice<T> {
  name: string;
  value: T;
  description?: string;
  disabled?: boolean | string;
}

export interface PromptAdapter {
  select<T>(options: {
    message: string;
    choices: Array<SelectChoice<T>>;
    pageSize?: number;
    defaultValue?: T;
  }): Promise<T>;
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
  }
};
