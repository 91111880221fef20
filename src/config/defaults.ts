import type { Config } from './validator';

export const defaults: Config = {
  loop: {
    max_attempts: 5,
  },
  oracle: {
    api_key: '',
    model: 'gemini-1.5-flash',
    base_url: 'https://generativelanguage.googleapis.com/v1beta',
    temperature: 0.2,
    timeout_ms: 60_000,
  },
  sandbox: {
    backend: 'docker',
    runtime: 'python',
    memory_limit: '256m',
    cpu_shares: 512,
    timeout_ms: 15_000,
    max_output_chars: 100_000,
  },
  e2b: {
    api_key: '',
    template: 'base',
  },
  output: {
    dir: '.fixloop',
  },
  illustration: {
    enabled: false,
    model: 'imagen-3.0-generate-002',
  },
};
