import { validateSolveOptions, ValidationError } from '../../../src/cli/validators/solve';

describe('validateSolveOptions', () => {
  it('should pass through a minimal set of options with flag defaults', () => {
    expect(validateSolveOptions({ problem: 'Add two numbers', tests: 'tests.py' })).toEqual({
      problem: 'Add two numbers',
      problemFile: undefined,
      tests: 'tests.py',
      maxAttempts: undefined,
      backend: undefined,
      runtime: undefined,
      timeoutMs: undefined,
      model: undefined,
      save: undefined,
      illustrate: false,
      json: false,
      verbose: false,
    });
  });

  it('should reject --problem together with --problem-file', () => {
    expect(() => validateSolveOptions({ problem: 'x', problemFile: 'p.md' })).toThrow('Use either --problem or --problem-file, not both');
  });

  it('should reject a blank problem', () => {
    expect(() => validateSolveOptions({ problem: '   ' })).toThrow('--problem must not be empty');
  });

  it('should parse max attempts', () => {
    expect(validateSolveOptions({ maxAttempts: '3' }).maxAttempts).toBe(3);
  });

  it('should reject max attempts that are not positive integers', () => {
    expect(() => validateSolveOptions({ maxAttempts: '0' })).toThrow('--max-attempts must be >= 1');
    expect(() => validateSolveOptions({ maxAttempts: 'abc' })).toThrow('--max-attempts must be a positive integer, got "abc"');
    expect(() => validateSolveOptions({ maxAttempts: '-2' })).toThrow(ValidationError);
  });

  it('should check backend and runtime names', () => {
    expect(validateSolveOptions({ backend: 'e2b', runtime: 'node' })).toMatchObject({ backend: 'e2b', runtime: 'node' });
    expect(() => validateSolveOptions({ backend: 'vm' })).toThrow('Invalid backend: "vm". Expected: docker, e2b');
    expect(() => validateSolveOptions({ runtime: 'ruby' })).toThrow('Invalid runtime: "ruby". Expected: python, node');
  });

  it('should enforce a minimum timeout', () => {
    expect(validateSolveOptions({ timeout: '5000' }).timeoutMs).toBe(5000);
    expect(() => validateSolveOptions({ timeout: '50' })).toThrow('--timeout must be >= 100 milliseconds');
  });
});
