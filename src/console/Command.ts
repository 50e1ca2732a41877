export type Command =
  | { type: 'SET'; key: string; value: string }
  | { type: 'GET'; key: string }
  | { type: 'UNSET'; key: string }
  | { type: 'NUMEQUALTO'; value: string }
  | { type: 'BEGIN' }
  | { type: 'ROLLBACK' }
  | { type: 'COMMIT' }
  | { type: 'END' };

export type ParseResult =
  | { kind: 'command'; command: Command }
  | { kind: 'empty' }
  | { kind: 'invalid'; verb: string; argumentCount: number };

export const INVALID_COMMAND_MESSAGE = 'Invalid method or number of arguments';

/**
 * Decodes one console line. The verb is case-insensitive; keys and values
 * are kept exactly as typed.
 */
export function parseCommand(line: string): ParseResult {
  const fields = line.trim().split(/\s+/).filter((field) => field.length > 0);
  if (fields.length === 0) {
    return { kind: 'empty' };
  }

  const [rawVerb, ...args] = fields;
  const verb = rawVerb.toUpperCase();
  const invalid: ParseResult = { kind: 'invalid', verb, argumentCount: args.length };

  switch (verb) {
    case 'SET':
      return args.length === 2
        ? { kind: 'command', command: { type: 'SET', key: args[0], value: args[1] } }
        : invalid;
    case 'GET':
      return args.length === 1 ? { kind: 'command', command: { type: 'GET', key: args[0] } } : invalid;
    case 'UNSET':
      return args.length === 1 ? { kind: 'command', command: { type: 'UNSET', key: args[0] } } : invalid;
    case 'NUMEQUALTO':
      return args.length === 1 ? { kind: 'command', command: { type: 'NUMEQUALTO', value: args[0] } } : invalid;
    case 'BEGIN':
      return args.length === 0 ? { kind: 'command', command: { type: 'BEGIN' } } : invalid;
    case 'ROLLBACK':
      return args.length === 0 ? { kind: 'command', command: { type: 'ROLLBACK' } } : invalid;
    case 'COMMIT':
      return args.length === 0 ? { kind: 'command', command: { type: 'COMMIT' } } : invalid;
    case 'END':
      return args.length === 0 ? { kind: 'command', command: { type: 'END' } } : invalid;
    default:
      return invalid;
  }
}
