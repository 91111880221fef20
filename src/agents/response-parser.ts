import type { Generation } from './types';

const THINKING_PATTERN = /<thinking>([\s\S]*?)<\/thinking>/i;
const ANY_FENCE_PATTERN = /```[\w+-]*[ \t]*\r?\n([\s\S]*?)```/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Split a model answer into rationale and code.
 *
 * The rationale is the `<thinking>` section. The code is the first block
 * fenced with the preferred language, else the first fenced block of any
 * language, else whatever follows `</thinking>`.
 */
export function parseGeneration(response: string, fenceLanguage: string): Generation {
  const rationale = THINKING_PATTERN.exec(response)?.[1]?.trim() ?? '';

  const preferred = new RegExp('```' + escapeRegExp(fenceLanguage) + '[ \\t]*\\r?\\n?([\\s\\S]*?)```', 'i');
  const fenced = preferred.exec(response)?.[1] ?? ANY_FENCE_PATTERN.exec(response)?.[1];
  if (fenced !== undefined && fenced.trim()) {
    return { rationale, code: fenced.trim() };
  }

  const afterThinking = response.split(/<\/thinking>/i).pop() ?? '';
  return { rationale, code: stripFences(afterThinking).trim() };
}

/** Drop stray fence markers left behind by an unterminated block */
function stripFences(text: string): string {
  return text.replace(/```[\w+-]*/g, '');
}
