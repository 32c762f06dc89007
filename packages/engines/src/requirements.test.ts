import { describe, expect, test } from 'vitest';
import { normalizeProjectName, parseRequirements } from './requirements.js';

describe('requirements parser', () => {
  test('keeps named requirements and records exact pins', () => {
    const text = [
      '# comment',
      'torch==2.1.0',
      'numpy >= 1.24  # pin later',
      'Requests[security,socks]==2.31.0 ; python_version >= "3.8"',
      '-r other.txt',
      './local/pkg',
      'git+https://example.invalid/x/y.git',
      'pkg @ https://example.invalid/pkg.whl',
      'scikit_learn===1.3.0 \\',
      '    --hash=sha256:abc',
      '',
    ].join('\n');

    expect(parseRequirements(text)).toEqual([
      { name: 'torch', rawName: 'torch', extras: [], specifier: '==2.1.0', version: '2.1.0', line: 2, text: 'torch==2.1.0' },
      { name: 'numpy', rawName: 'numpy', extras: [], specifier: '>=1.24', line: 3, text: 'numpy >= 1.24' },
      {
        name: 'requests',
        rawName: 'Requests',
        extras: ['security', 'socks'],
        specifier: '==2.31.0',
        version: '2.31.0',
        marker: 'python_version >= "3.8"',
        line: 4,
        text: 'Requests[security,socks]==2.31.0 ; python_version >= "3.8"',
      },
      {
        name: 'scikit-learn',
        rawName: 'scikit_learn',
        extras: [],
        specifier: '===1.3.0',
        version: '1.3.0',
        line: 9,
        text: 'scikit_learn===1.3.0',
      },
    ]);
  });

  test('wildcard and range pins are not exact', () => {
    const [a, b] = parseRequirements('foo==1.*\nbar>=1,<2\n');
    expect(a?.version).toBeUndefined();
    expect(b?.specifier).toBe('>=1,<2');
    expect(b?.version).toBeUndefined();
  });

  test('normalizes project names', () => {
    expect(normalizeProjectName('Scikit__Learn.Extra')).toBe('scikit-learn-extra');
  });
});
