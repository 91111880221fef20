import chalk from 'chalk';
import type { EventSink, LoopEvent } from '../orchestrator/events';
import { formatCode, formatError, formatExecutionResult, formatInfo, formatRationale, formatStep, formatSuccess } from './formatters';

export type ConsoleSinkOptions = {
  /** Print one JSON object per event instead of formatted text */
  json?: boolean;
  write?: (line: string) => void;
};

/** Renders the event stream on the terminal as it happens */
export class ConsoleSink implements EventSink {
  private json: boolean;
  private write: (line: string) => void;

  constructor(opts: ConsoleSinkOptions = {}) {
    this.json = opts.json ?? false;
    this.write = opts.write ?? ((line) => console.log(line));
  }

  emit(event: LoopEvent): void {
    if (this.json) {
      this.write(JSON.stringify(event));
      return;
    }
    this.write(this.render(event));
  }

  render(event: LoopEvent): string {
    switch (event.type) {
      case 'start':
        return `${chalk.bold.cyan('Problem')}\n${formatInfo(event.problem.statement)}\n${formatInfo(`session ${event.sessionId}, up to ${event.maxAttempts} attempts`)}`;
      case 'status':
        return formatStep(event.message);
      case 'rationale':
        return formatRationale(event.attempt, event.content);
      case 'code':
        return formatCode(event.attempt, event.content);
      case 'illustration':
        return formatInfo(`Illustration for attempt ${event.attempt}: ${event.path}`);
      case 'result':
        return formatExecutionResult(event.attempt, event.result);
      case 'done':
        return formatSuccess(`Solved on attempt ${event.attempt}.`);
      case 'error':
        return formatError(event.message);
    }
  }
}
