import type { Runtime } from '../config/validator';

/** The task to solve. Never mutated once a session starts. */
export interface Problem {
  readonly statement: string;
  readonly tests: string;
}

/** What the previous attempt produced, fed back to guide the next one */
export interface Feedback {
  attempt: number;
  code: string;
  stdout: string;
  stderr: string;
}

export interface GenerationRequest {
  problem: Problem;
  /** 1-based index of the attempt being generated */
  attempt: number;
  runtime: Runtime;
  /** Present from the second attempt on; always the immediately preceding attempt */
  previous?: Feedback;
}

export interface Generation {
  rationale: string;
  code: string;
}

export interface GenerationOracle {
  generate(request: GenerationRequest): Promise<Generation>;
}
