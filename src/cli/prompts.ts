import inquirer from 'inquirer';
import type { ProblemInput } from './types';

type ProblemAnswers = {
  statement?: string;
  tests?: string;
};

/**
 * Ask for whatever part of the problem was not given on the command line.
 * Tests are entered in the user's editor, one assertion per line.
 */
export const promptForProblem = async (known: Partial<ProblemInput>): Promise<ProblemInput> => {
  const answers = await inquirer.prompt<ProblemAnswers>([
    {
      type: 'input',
      name: 'statement',
      message: 'Enter the programming problem you want to solve:',
      when: () => !known.statement,
      validate: (input: string) => input.trim().length > 0 || 'Problem statement is required',
    },
    {
      type: 'editor',
      name: 'tests',
      message: 'Enter the test cases (one assertion per line):',
      when: () => !known.tests,
      validate: (input: string) => input.trim().length > 0 || 'At least one test case is required',
    },
  ]);

  return {
    statement: known.statement ?? answers.statement?.trim() ?? '',
    tests: known.tests ?? answers.tests?.trim() ?? '',
  };
};
