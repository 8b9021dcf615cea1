import inquirer from 'inquirer';
import { z } from 'zod';

const confirmAnswer = z.object({ confirmed: z.boolean() });

/** Yes/no question on the terminal; defaults to no */
export async function confirm(message: string): Promise<boolean> {
  const answers = await inquirer.prompt([{ type: 'confirm', name: 'confirmed', message, default: false }]);
  return confirmAnswer.parse(answers).confirmed;
}
