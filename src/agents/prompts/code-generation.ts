import type { Runtime } from '../../config/validator';
import type { Feedback, Problem } from '../types';
import type { ErrorAnalysis } from '../error-analyzer';

const LANGUAGE_NAMES: Record<Runtime, string> = {
  python: 'Python',
  node: 'JavaScript (Node.js)',
};

export const FENCE_LANGUAGES: Record<Runtime, string> = {
  python: 'python',
  node: 'javascript',
};

export const getSystemPrompt = (runtime: Runtime): string => {
  const language = LANGUAGE_NAMES[runtime];
  const fence = FENCE_LANGUAGES[runtime];

  return `
ACT AS: Expert ${language} programming agent
TASK: Write correct, working ${language} code that solves the given problem and passes the given tests.

You work in a reason-then-act loop:
1. REASON: Think step-by-step about the problem or the error. If you are fixing a bug, explain the root cause. Enclose your entire reasoning in <thinking></thinking> tags.
2. ACT: After reasoning, write the complete ${language} code in a single \`\`\`${fence} ... \`\`\` block. Do not write anything after the code block.

### CRITICAL RULES
1. Do NOT include the test cases in your code; they are appended automatically.
2. Do NOT read input from stdin, the network or files outside the working directory.
3. The code must be self-contained and use only the standard library.
`.trim();
};

export const getInitialPrompt = (problem: Problem, runtime: Runtime): string => {
  const fence = FENCE_LANGUAGES[runtime];

  return `
### PROBLEM STATEMENT
${problem.statement}

### TEST CASES
\`\`\`${fence}
${problem.tests}
\`\`\`

Write ${LANGUAGE_NAMES[runtime]} code that solves this problem and passes all of the test cases above.
`.trim();
};

export const getCorrectionPrompt = (problem: Problem, feedback: Feedback, analysis: ErrorAnalysis, runtime: Runtime): string => {
  const fence = FENCE_LANGUAGES[runtime];
  const failurePoints = analysis.failurePoints.length > 0 ? analysis.failurePoints.map((p) => `- ${p}`).join('\n') : '- (none extracted)';

  return `
The code you wrote in attempt ${feedback.attempt} failed. Do not apologize. Analyze the error and fix the code.

### ORIGINAL PROBLEM STATEMENT
${problem.statement}

### TEST CASES
\`\`\`${fence}
${problem.tests}
\`\`\`

### YOUR PREVIOUS CODE
\`\`\`${fence}
${feedback.code}
\`\`\`

### EXECUTION RESULT
STDOUT:
${feedback.stdout || '(empty)'}

STDERR:
${feedback.stderr || '(empty)'}

### FAILURE SUMMARY
${analysis.summary}
${failurePoints}
Suggested focus: ${analysis.suggestedFocus}

First, reason about why the code failed inside <thinking></thinking> tags. Then provide the complete, corrected code in a \`\`\`${fence} ... \`\`\` block.
`.trim();
};
