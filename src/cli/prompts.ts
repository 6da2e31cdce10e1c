/**
 * Terminal prompts backed by inquirer
 */

import inquirer from 'inquirer';
import type { InteractiveInput } from '@/types';

export function createInquirerInput(): InteractiveInput {
  return {
    async input(message) {
      const { value } = await inquirer.prompt<{ value: string }>([
        {
          type: 'input',
          name: 'value',
          message,
        },
      ]);
      return value;
    },

    async select(message, choices) {
      const { value } = await inquirer.prompt<{ value: string }>([
        {
          type: 'list',
          name: 'value',
          message,
          choices: [...choices],
        },
      ]);
      return value;
    },
  };
}
