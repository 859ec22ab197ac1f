#!/usr/bin/env node

import { readFileSync } from 'fs';
import { compile } from './dsl/Lowering.js';
import { ParseError, formatParseError } from './dsl/Errors.js';
import { formatFunction } from './forward/IR.js';
import { transform } from './forward/Transformer.js';
import { emitSource } from './forward/CodeGen.js';
import type { CodeGenOptions } from './forward/CodeGen.js';
import { valueAndGradient } from './forward/Gradient.js';
import { GradientChecker, formatGradCheckResult } from './forward/GradientChecker.js';

type EmitFormat = 'ir' | 'typescript' | 'javascript';

interface CliOptions {
  emit: EmitFormat;
  includeComments: boolean;
  at?: number[];
  check: boolean;
}

function printUsage() {
  console.log(`
DualScript - Forward-mode differentiation of straight-line functions

Usage:
  dualscript <file.ds> [options]

Options:
  --emit <format>       Output: ir (default), typescript, javascript
  --at <x1,x2,...>      Evaluate value and gradient at a point
  --check               Compare gradients at --at against finite differences
  --no-comments         Omit comments in emitted source
  --help, -h            Show this help message

Examples:
  dualscript model.ds
  dualscript model.ds --emit typescript
  dualscript model.ds --at 1,2 --check

Input File Format (.ds):
  function name(x, y) {
    s = x + y
    return x^2 + sin(s)
  }

  Operators + - * / ^ map to the add, sub, mul, div and pow rules;
  any other call name(args) must be a registered rule.
  All functions in the file are processed.
  `.trim());
}

function parsePoint(value: string): number[] {
  const point = value.split(',').map(part => Number(part.trim()));
  if (point.some(x => !Number.isFinite(x))) {
    throw new Error(`Invalid point "${value}". Expected comma-separated numbers.`);
  }
  return point;
}

function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = {
    emit: 'ir',
    includeComments: true,
    check: false
  };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];

    if (arg === '--emit') {
      if (i + 1 >= args.length) {
        throw new Error('Missing value for --emit');
      }
      const format = args[++i];
      if (format !== 'ir' && format !== 'typescript' && format !== 'javascript') {
        throw new Error(`Invalid format "${format}". Must be: ir, typescript, or javascript`);
      }
      options.emit = format;
    } else if (arg === '--at') {
      if (i + 1 >= args.length) {
        throw new Error('Missing value for --at');
      }
      options.at = parsePoint(args[++i]);
    } else if (arg === '--check') {
      options.check = true;
    } else if (arg === '--no-comments') {
      options.includeComments = false;
    } else {
      throw new Error(`Unknown option "${arg}"`);
    }
  }

  if (options.check && !options.at) {
    throw new Error('--check requires --at');
  }

  return options;
}

function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const inputFile = args[0];

  if (!inputFile.endsWith('.ds')) {
    console.error('Error: Input file must have .ds extension');
    process.exit(1);
  }

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    printUsage();
    process.exit(1);
  }

  let input: string;
  try {
    input = readFileSync(inputFile, 'utf-8');
  } catch (err) {
    console.error(`Error: Could not read file "${inputFile}"`);
    if (err instanceof Error) {
      console.error(err.message);
    }
    process.exit(1);
  }

  try {
    const functions = compile(input);
    const outputs: string[] = [];

    functions.forEach((ir, index) => {
      const transformed = transform(ir);

      if (options.emit === 'ir') {
        outputs.push(formatFunction(ir) + '\n\n' + transformed.toString());
      } else {
        const codeGenOptions: CodeGenOptions = {
          format: options.emit,
          includeComments: options.includeComments,
          includePrelude: index === 0
        };
        outputs.push(emitSource(transformed, codeGenOptions));
      }

      if (options.at) {
        const { value, gradient } = valueAndGradient(transformed, options.at);
        const partials = transformed.params.map((p, i) => `d/d${p} = ${gradient[i]}`).join(', ');
        outputs.push(`${ir.name}(${options.at.join(', ')}) = ${value}; ${partials}`);

        if (options.check) {
          const result = new GradientChecker().check(transformed, options.at);
          outputs.push(formatGradCheckResult(result, ir.name));
        }
      }
    });

    console.log(outputs.join('\n\n'));
  } catch (err) {
    if (err instanceof ParseError) {
      console.error(formatParseError(err, input));
    } else {
      console.error('Error: Failed to process input file');
      if (err instanceof Error) {
        console.error(err.message);
      }
    }
    process.exit(1);
  }
}

main();
