/**
 * Sandbox runtimes
 *
 * Each runtime wraps a generated source unit in a harness that pins the
 * working directory, exposes OUTPUT_DIR, keeps plotting off-screen and
 * turns an uncaught error into a printed traceback plus exit status 1.
 */

import type { HarnessContext, SandboxRuntime } from '@/types/index.js';

/**
 * Indent every non-blank line
 */
export function indentCode(code: string, spaces: number): string {
  const pad = ' '.repeat(spaces);
  return code
    .split('\n')
    .map((line) => (line.trim() ? pad + line : line))
    .join('\n');
}

export function wrapPythonCode(code: string, context: HarnessContext): string {
  const workingDirectory = JSON.stringify(context.workingDirectory);
  const outputDirectory = JSON.stringify(context.outputDirectory);
  const body = code.trim() ? indentCode(code, 4) : '    pass';

  return `import os
import sys
import traceback
import warnings

warnings.filterwarnings('ignore')

os.chdir(${workingDirectory})
sys.path.insert(0, ${workingDirectory})

OUTPUT_DIR = ${outputDirectory}
os.makedirs(OUTPUT_DIR, exist_ok=True)

try:
    import matplotlib
    matplotlib.use('Agg')
    import matplotlib.pyplot as plt
    from matplotlib.figure import Figure

    _original_savefig = Figure.savefig

    def _savefig_to_output(self, fname, *args, **kwargs):
        if isinstance(fname, (str, os.PathLike)):
            fname = os.path.join(OUTPUT_DIR, os.path.basename(os.fspath(fname)))
        return _original_savefig(self, fname, *args, **kwargs)

    Figure.savefig = _savefig_to_output
    plt.show = lambda *args, **kwargs: None
except ImportError:
    plt = None

try:
${body}

    if plt is not None and plt.get_fignums():
        plt.savefig(os.path.join(OUTPUT_DIR, 'analysis_chart.png'), dpi=100, bbox_inches='tight')
        plt.close('all')
except Exception as exc:
    print(f"Analysis Error: {exc}")
    traceback.print_exc()
    sys.exit(1)
`;
}

export function wrapNodeCode(code: string, context: HarnessContext): string {
  const workingDirectory = JSON.stringify(context.workingDirectory);
  const outputDirectory = JSON.stringify(context.outputDirectory);
  const body = indentCode(code, 4);

  return `'use strict';
const fs = require('fs');
const path = require('path');

process.chdir(${workingDirectory});

const OUTPUT_DIR = ${outputDirectory};
fs.mkdirSync(OUTPUT_DIR, { recursive: true });

(async () => {
  try {
${body}
  } catch (error) {
    console.log('Analysis Error: ' + (error && error.message ? error.message : String(error)));
    console.error(error && error.stack ? error.stack : String(error));
    process.exitCode = 1;
  }
})();
`;
}

export function createPythonRuntime(interpreter = 'python3'): SandboxRuntime {
  return {
    name: 'python',
    command: interpreter,
    args: [],
    fileExtension: '.py',
    env: {
      MPLBACKEND: 'Agg',
      PYTHONIOENCODING: 'utf-8',
      PYTHONUNBUFFERED: '1',
    },
    wrap: wrapPythonCode,
  };
}

/**
 * Runs JavaScript sources on the current Node binary by default
 */
export function createNodeRuntime(
  executable: string = process.execPath
): SandboxRuntime {
  return {
    name: 'node',
    command: executable,
    args: [],
    fileExtension: '.cjs',
    wrap: wrapNodeCode,
  };
}
