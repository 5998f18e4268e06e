import yargs from 'yargs';
import type { Result } from 'neverthrow';
import { colors, logger, useColors } from '../utils/debug.js';
import type { RegexSyntaxError } from './errors.js';
import { tokenize } from './lexer.js';
import { postfixToString, toPostfix } from './postfix.js';
import { compileRegex } from './regex.js';

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

function builder<T>(yargs: yargs.Argv<T>) {
  return yargs.positional('pattern', {
    describe: 'pattern using letters, digits, ( ) | and *',
    type: 'string',
    demandOption: true,
  });
}

/**
 * Run the command line interface against the given arguments.
 *
 * @returns the process exit code: 0 on success, 1 when `match` rejected
 * an input, 2 when the pattern has a syntax error or the arguments are
 * not understood
 */
export async function runCli(
  argv: string[],
  out: CliOutput = console
): Promise<number> {
  let exitCode = 0;
  const cleanups: (() => void)[] = [];

  const unwrap = <T>(
    pattern: string,
    result: Result<T, RegexSyntaxError>
  ): T | null => {
    if (result.isErr()) {
      result.error.attachSource(pattern);
      out.error(colors.red(result.error.message));
      exitCode = 2;
      return null;
    }
    return result.value;
  };

  const parser = yargs(argv)
    .scriptName('regex-automata')
    .option('verbose', {
      alias: 'v',
      type: 'boolean',
      description: 'Log each construction step',
      default: false,
    })
    .option('color', {
      type: 'boolean',
      description: 'Color the output',
      default: false,
    })
    .middleware((args) => {
      useColors(args.color);
      if (args.verbose && cleanups.length == 0) {
        cleanups.push(
          logger.subscribe((...logArgs: unknown[]) =>
            out.error(colors.cyan(logArgs.join(' ')))
          )
        );
      }
    })
    .command({
      command: 'tokens <pattern>',
      describe: 'print the tokens of a pattern',
      builder,
      handler: (args) => {
        const tokens = unwrap(args.pattern, tokenize(args.pattern));
        for (const token of tokens ?? []) {
          out.log(`${token.token} ${token.substr} @${token.span.from}`);
        }
      },
    })
    .command({
      command: 'postfix <pattern>',
      describe: 'print a pattern in postfix order',
      builder,
      handler: (args) => {
        const postfix = unwrap(args.pattern, toPostfix(args.pattern));
        if (postfix) {
          out.log(postfixToString(postfix));
        }
      },
    })
    .command({
      command: 'nfa <pattern>',
      describe: 'print the NFA built from a pattern',
      builder: (yargs) =>
        builder(yargs).option('list', {
          type: 'boolean',
          description: 'List reachable states instead of a table',
          default: false,
        }),
      handler: (args) => {
        const compiled = unwrap(args.pattern, compileRegex(args.pattern));
        if (compiled) {
          const { nfa } = compiled;
          out.log(`start: s${nfa.start}, accept: s${nfa.accept}`);
          out.log(args.list ? nfa.describe() : nfa.toDebugStr().trimEnd());
        }
      },
    })
    .command({
      command: 'dfa <pattern>',
      describe: 'print the DFA built from a pattern',
      builder: (yargs) =>
        builder(yargs).option('json', {
          type: 'boolean',
          description: 'Print the DFA as JSON',
          default: false,
        }),
      handler: (args) => {
        const compiled = unwrap(args.pattern, compileRegex(args.pattern));
        if (compiled) {
          out.log(
            args.json
              ? JSON.stringify(compiled.dfa, null, 2)
              : compiled.dfa.toDebugStr().trimEnd()
          );
        }
      },
    })
    .command({
      command: 'match <pattern> [inputs..]',
      describe: 'check whether each input matches the whole pattern',
      builder: (yargs) =>
        builder(yargs).positional('inputs', {
          describe: 'strings to test',
          type: 'string',
          array: true,
        }),
      handler: (args) => {
        const compiled = unwrap(args.pattern, compileRegex(args.pattern));
        if (!compiled) {
          return;
        }
        for (const input of args.inputs ?? []) {
          const accepted = compiled.dfa.accepts(input);
          const verdict = accepted ? colors.green('accept') : colors.red('reject');
          out.log(`${verdict} ${JSON.stringify(input)}`);
          if (!accepted) {
            exitCode = 1;
          }
        }
      },
    })
    .demandCommand(1)
    .strict()
    .fail((msg, e) => {
      out.error(colors.red(msg || String(e)));
      exitCode = 2;
    })
    .exitProcess(false);

  try {
    await parser.parseAsync();
  } finally {
    cleanups.forEach((cleanup) => cleanup());
  }
  return exitCode;
}
