export class ParseError extends Error {
  constructor(
    message: string,
    public line: number,
    public column: number,
    public token?: string
  ) {
    super(`Parse error at ${line}:${column}: ${message}`);
    this.name = 'ParseError';
  }
}

/**
 * Format a user-friendly error message with source context
 */
export function formatParseError(
  error: ParseError,
  sourceCode: string,
  verbose: boolean = false
): string {
  const lines = sourceCode.split('\n');
  const errorLine = lines[error.line - 1];

  let output = `Error: ${error.message.replace(/^Parse error at \d+:\d+: /, '')}\n`;

  if (errorLine) {
    output += `\n  ${errorLine}\n`;

    const caretPos = Math.max(0, error.column - 1);
    output += `  ${' '.repeat(caretPos)}^\n`;
  }

  output += formatErrorGuidance(error);

  if (verbose && error.stack) {
    output += '\n\nStack trace:\n' + error.stack;
  }

  return output;
}

/**
 * Contextual guidance based on error patterns
 */
function formatErrorGuidance(error: ParseError): string {
  const msg = error.message.toLowerCase();

  if (error.token === ';') {
    return `
Semicolons are not part of DualScript syntax.
Each statement should be on its own line.

Correct syntax:
  function example(x, y) {
    s = x + y
    return sin(s)
  }
`;
  }

  if (msg.includes("expected 'return'")) {
    return `
Every function body ends with a single return statement.
`;
  }

  if (msg.includes("expected ']'")) {
    return `
Parameterized calls take one state expression in brackets: scale[w](x)
`;
  }

  return '';
}
