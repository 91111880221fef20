/** Raw options as commander hands them over */
export interface SolveCommandOptions {
  problem?: string;
  problemFile?: string;
  tests?: string;
  maxAttempts?: string;
  backend?: string;
  runtime?: string;
  timeout?: string;
  model?: string;
  save?: string;
  illustrate?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export interface ProblemInput {
  statement: string;
  tests: string;
}
