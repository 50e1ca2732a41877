import { DBConsole } from '../src/console/DBConsole';
import { Engine } from '../src/db/Engine';
import { enableTestLogging, logger } from '../src/utils/logger';
import { ModelStore, createRandom, pick } from './helpers/model';

// Runs lines through a fresh console and collects what it prints
function run(lines: string[]): string[] {
  const session = new DBConsole();
  const output: string[] = [];
  for (const line of lines) {
    const result = session.handleLine(line);
    if (result.output !== undefined) output.push(result.output);
    if (result.done) break;
  }
  return output;
}

describe('Integration - command scenarios', () => {
  beforeAll(() => {
    if (process.env.LOG_TESTS === 'true') {
      enableTestLogging('debug');
      logger.info('Test logging enabled');
    }
  });

  test('set then get', () => {
    expect(run(['SET a 1', 'GET a'])).toEqual(['1']);
  });

  test('value counts follow overwrites', () => {
    expect(run(['SET a 1', 'SET a 2', 'SET b 2', 'NUMEQUALTO 2'])).toEqual(['2']);
  });

  test('inner rollback restores the enclosing write', () => {
    expect(run(['BEGIN', 'SET a 10', 'BEGIN', 'SET a 20', 'ROLLBACK', 'GET a'])).toEqual(['10']);
  });

  test('unset inside a rolled back block', () => {
    expect(run(['SET a 10', 'BEGIN', 'UNSET a', 'GET a', 'ROLLBACK', 'GET a'])).toEqual(['NULL', '10']);
  });

  test('rollback without a transaction', () => {
    expect(run(['ROLLBACK'])).toEqual(['NO TRANSACTION']);
  });

  test('commit closes all blocks', () => {
    expect(run([
      'SET a 1', 'BEGIN', 'SET a 2', 'BEGIN', 'SET a 3', 'COMMIT', 'GET a', 'ROLLBACK'
    ])).toEqual(['3', 'NO TRANSACTION']);
  });

  test('counts across nested blocks', () => {
    expect(run([
      'SET a 10', 'BEGIN', 'NUMEQUALTO 10', 'BEGIN', 'UNSET a', 'NUMEQUALTO 10',
      'ROLLBACK', 'NUMEQUALTO 10', 'COMMIT', 'NUMEQUALTO 10'
    ])).toEqual(['1', '0', '1', '1']);
  });

  test('malformed lines are reported and skipped', () => {
    expect(run(['SET a', 'FOO', 'GET a b', 'SET a 1', 'GET a'])).toEqual([
      'Invalid method or number of arguments',
      'Invalid method or number of arguments',
      'Invalid method or number of arguments',
      '1'
    ]);
  });

  test('nothing after END is processed', () => {
    expect(run(['SET a 1', 'END', 'GET a'])).toEqual([]);
  });
});

describe('Integration - engine against a reference model', () => {
  const keys = ['a', 'b', 'c', 'd', 'e'];
  const values = ['1', '2', '3', '4'];

  function check(engine: Engine, model: ModelStore): void {
    for (const key of keys) {
      expect(engine.get(key)).toBe(model.get(key));
    }
    for (const value of values) {
      expect(engine.numEqualTo(value)).toBe(model.numEqualTo(value));
    }
  }

  test.each([1, 2, 3, 7, 42, 1234, 9001, 65535])('random operations agree for seed %i', (seed) => {
    const random = createRandom(seed);
    const engine = new Engine();
    const model = new ModelStore();

    for (let step = 0; step < 400; step++) {
      const roll = random();

      if (roll < 0.4) {
        const key = pick(random, keys);
        const value = pick(random, values);
        engine.set(key, value);
        model.set(key, value);
      } else if (roll < 0.6) {
        const key = pick(random, keys);
        engine.unset(key);
        model.unset(key);
      } else if (roll < 0.75) {
        engine.begin();
        model.begin();
      } else if (roll < 0.9) {
        expect(engine.rollback()).toBe(model.rollback());
      } else {
        expect(engine.commit()).toBe(model.commit());
      }

      check(engine, model);
    }

    engine.commit();
    model.commit();
    expect(engine.snapshot().data).toEqual(model.toObject());
  });

  test('rollback restores the view from before BEGIN', () => {
    const random = createRandom(77);
    const engine = new Engine();
    for (const key of keys) {
      engine.set(key, pick(random, values));
    }
    engine.begin();
    engine.set('a', '9');

    const before = keys.map((key) => engine.get(key));
    const counts = values.map((value) => engine.numEqualTo(value));

    engine.begin();
    for (let step = 0; step < 50; step++) {
      const key = pick(random, keys);
      if (random() < 0.5) {
        engine.set(key, pick(random, values));
      } else {
        engine.unset(key);
      }
      if (random() < 0.1) {
        engine.begin();
      }
    }
    while (engine.depth > 1) {
      engine.rollback();
    }

    expect(keys.map((key) => engine.get(key))).toEqual(before);
    expect(values.map((value) => engine.numEqualTo(value))).toEqual(counts);
  });
});
