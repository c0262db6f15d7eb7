/**
 * Code Extractor Unit Tests
 */

import { describe, expect, it } from 'vitest';

import { composeProgram, extractCode } from '@/orchestrator/code-extractor.js';

describe('extractCode()', () => {
  it('should return the body of a fenced block', () => {
    const response =
      "Here is the code:\n```python\nprint(len(customers))\n```\nIt prints the count.";

    expect(extractCode(response)).toBe('print(len(customers))');
  });

  it('should take the first block when there are several', () => {
    const response = '```js\nconsole.log(1);\n```\n\n```js\nconsole.log(2);\n```';

    expect(extractCode(response)).toBe('console.log(1);');
  });

  it('should accept a fence without a language tag', () => {
    expect(extractCode('```\nx = 1\n```')).toBe('x = 1');
  });

  it('should return plain code unchanged apart from trimming', () => {
    expect(extractCode('\n  x = 1\ny = 2  \n')).toBe('x = 1\ny = 2');
  });

  it('should strip an unterminated opening fence', () => {
    expect(extractCode('```python\nx = 1\ny = 2')).toBe('x = 1\ny = 2');
  });

  it('should return an empty string for fences with no code', () => {
    expect(extractCode('```python\n```')).toBe('');
    expect(extractCode('   ')).toBe('');
  });
});

describe('composeProgram()', () => {
  it('should put the loader before the analysis', () => {
    expect(composeProgram("import pandas as pd\n", "print('hi')")).toBe(
      "import pandas as pd\n\nprint('hi')\n"
    );
  });

  it('should return the code alone without a loader', () => {
    expect(composeProgram('  ', 'x = 1')).toBe('x = 1\n');
  });
});
