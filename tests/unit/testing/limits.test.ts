import { niceLevelForShares, parseMemoryLimit, truncateOutput } from '../../../src/testing/limits';
import { buildBundle, RUNTIMES } from '../../../src/testing/runtimes';

describe('parseMemoryLimit', () => {
  it('should convert sizes to bytes', () => {
    expect(parseMemoryLimit('512k')).toBe(524288);
    expect(parseMemoryLimit('256m')).toBe(268435456);
    expect(parseMemoryLimit('1G')).toBe(1073741824);
  });

  it('should reject sizes without a unit', () => {
    expect(() => parseMemoryLimit('256')).toThrow(RangeError);
    expect(() => parseMemoryLimit('lots')).toThrow('Invalid memory limit: "lots"');
  });
});

describe('niceLevelForShares', () => {
  it('should keep default priority at or above 1024 shares', () => {
    expect(niceLevelForShares(1024)).toBe(0);
    expect(niceLevelForShares(4096)).toBe(0);
  });

  it('should add 5 per halving and clamp at 19', () => {
    expect(niceLevelForShares(512)).toBe(5);
    expect(niceLevelForShares(256)).toBe(10);
    expect(niceLevelForShares(2)).toBe(19);
  });
});

describe('truncateOutput', () => {
  it('should leave short output alone', () => {
    expect(truncateOutput('short', 10)).toBe('short');
  });

  it('should cut long output and mark the cut', () => {
    expect(truncateOutput('abcdefghij', 4)).toBe('abcd\n[output truncated]');
  });

  it('should not split a surrogate pair at the cut', () => {
    expect(truncateOutput('ab\u{1F600}cd', 3)).toBe('ab\n[output truncated]');
    expect(truncateOutput('ab\u{1F600}cd', 4)).toBe('ab\u{1F600}\n[output truncated]');
  });
});

describe('buildBundle', () => {
  it('should append the tests under a comment in the runtime syntax', () => {
    const bundle = buildBundle(RUNTIMES.node, 'const x = 1;', 'assert.ok(x);');

    expect(bundle).toEqual({
      runtime: 'node',
      fileName: 'script.js',
      content: 'const x = 1;\n\n// Test cases\nassert.ok(x);\n',
      command: ['node', 'script.js'],
    });
  });

  it('should not share the command array with the runtime profile', () => {
    const bundle = buildBundle(RUNTIMES.python, 'x = 1', 'assert x');
    bundle.command.push('--extra');

    expect(RUNTIMES.python.command).toEqual(['python3', 'script.py']);
  });
});
