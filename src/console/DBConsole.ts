import { createInterface } from 'readline';
import type { Readable, Writable } from 'stream';
import { Engine } from '../db/Engine';
import { Command, INVALID_COMMAND_MESSAGE, parseCommand } from './Command';
import { consoleLogger } from '../utils/logger';
import { kvMetrics } from '../monitoring/metrics';

export const NULL_OUTPUT = 'NULL';
export const NO_TRANSACTION_OUTPUT = 'NO TRANSACTION';

export interface LineResult {
  /** Line to print, if the command produces one */
  output?: string;
  /** Session should stop reading */
  done: boolean;
}

/**
 * Line-oriented front end for one engine session
 */
export class DBConsole {
  private log = consoleLogger;

  constructor(public readonly engine: Engine = new Engine()) {}

  handleLine(line: string): LineResult {
    const parsed = parseCommand(line);

    switch (parsed.kind) {
      case 'empty':
        return { done: false };
      case 'invalid':
        kvMetrics.commandsTotal.inc({ command: 'INVALID' });
        this.log.debug({ verb: parsed.verb, argumentCount: parsed.argumentCount }, 'Rejected command');
        return { output: INVALID_COMMAND_MESSAGE, done: false };
      case 'command': {
        const command = parsed.command;
        const endTimer = kvMetrics.commandDuration.startTimer({ command: command.type });
        kvMetrics.commandsTotal.inc({ command: command.type });
        this.log.trace({ command }, 'Executing command');

        const result = this.execute(command);
        endTimer();
        return result;
      }
    }
  }

  execute(command: Command): LineResult {
    switch (command.type) {
      case 'SET':
        this.engine.set(command.key, command.value);
        return { done: false };
      case 'GET':
        return { output: this.engine.get(command.key) ?? NULL_OUTPUT, done: false };
      case 'UNSET':
        this.engine.unset(command.key);
        return { done: false };
      case 'NUMEQUALTO':
        return { output: String(this.engine.numEqualTo(command.value)), done: false };
      case 'BEGIN':
        this.engine.begin();
        return { done: false };
      case 'ROLLBACK':
        return this.engine.rollback() ? { done: false } : { output: NO_TRANSACTION_OUTPUT, done: false };
      case 'COMMIT':
        return this.engine.commit() ? { done: false } : { output: NO_TRANSACTION_OUTPUT, done: false };
      case 'END':
        return { done: true };
    }
  }

  /**
   * Reads commands until END or end of input, writing one line per output.
   * Resolves with the number of lines read.
   */
  async listen(input: Readable, output: Writable): Promise<number> {
    const rl = createInterface({ input, crlfDelay: Infinity, terminal: false });
    let lines = 0;

    this.log.info({ action: 'session_start' }, 'Session started');

    try {
      for await (const line of rl) {
        lines++;
        const result = this.handleLine(line);
        if (result.output !== undefined) {
          output.write(`${result.output}\n`);
        }
        if (result.done) break;
      }
    } finally {
      rl.close();
    }

    this.log.info({
      lines,
      openBlocks: this.engine.depth,
      action: 'session_end'
    }, 'Session ended');
    return lines;
  }
}
