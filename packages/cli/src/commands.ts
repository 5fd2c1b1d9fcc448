/**
 * Command parsing for the terminal front end
 *
 * The quantity is passed through as typed; the ledger decides whether it
 * is a valid number of shares.
 */

export type Command =
  | { kind: 'buy'; quantity: string }
  | { kind: 'sell'; quantity: string }
  | { kind: 'status' }
  | { kind: 'chart' }
  | { kind: 'help' }
  | { kind: 'quit' }
  | { kind: 'empty' }
  | { kind: 'unknown'; input: string };

export const HELP_TEXT = [
  'Commands:',
  '  buy <n>    (b)   buy n shares at the current price',
  '  sell <n>   (s)   sell n shares at the current price',
  '  status     (st)  cash, shares and portfolio value',
  '  chart      (c)   recent prices with trade markers',
  '  help       (h)   this list',
  '  quit       (q)   save and exit',
].join('\n');

export function parseCommand(line: string): Command {
  const trimmed = line.trim();
  if (trimmed === '') {
    return { kind: 'empty' };
  }

  const [word, ...rest] = trimmed.split(/\s+/);
  const argument = rest.join(' ');

  switch (word.toLowerCase()) {
    case 'buy':
    case 'b':
      return { kind: 'buy', quantity: argument };
    case 'sell':
    case 's':
      return { kind: 'sell', quantity: argument };
    case 'status':
    case 'st':
      return { kind: 'status' };
    case 'chart':
    case 'c':
      return { kind: 'chart' };
    case 'help':
    case 'h':
    case '?':
      return { kind: 'help' };
    case 'quit':
    case 'q':
    case 'exit':
      return { kind: 'quit' };
    default:
      return { kind: 'unknown', input: trimmed };
  }
}
