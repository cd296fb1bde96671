import enquirer from 'enquirer';
import { PromptCancelledError } from './errors';

const { prompt } = enquirer;

export async function promptConfirm(message: string, initial = true): Promise<boolean> {
  try {
    const answers = await prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message,
        initial,
      },
    ]);
    return answers.confirm;
  } catch (error) {
    // enquirer rejects with a bare value, not an Error, on Ctrl+C / Esc
    if (error instanceof Error) throw error;
    throw new PromptCancelledError();
  }
}
