import type { InstanceOptions } from './config.js';
import { FixtureContext, getDefaultContext } from './fixture.js';
import type { DbHandle } from './handle.js';
import type { Instance } from './instance.js';
import { startInstance, type LaunchEnvironment } from './launcher.js';
import { PgFixtureError } from './errors.js';
import type { ConnectionInfo } from './types.js';

export interface TestInstance {
  instance: Instance;
  connectionString: string;
  config: ConnectionInfo;
  port: number;
  stop: () => Promise<void>;
}

/**
 * Start a dedicated instance, not shared with anyone.
 * Returns it running, with superuser connection details.
 */
export async function createTestInstance(
  options?: InstanceOptions,
  environment?: LaunchEnvironment
): Promise<TestInstance> {
  const instance = await startInstance(options, environment);
  return {
    instance,
    connectionString: instance.superuserUrl,
    config: instance.getPgConfig(),
    port: instance.port,
    stop: () => instance.stop(),
  };
}

export interface TestHelper {
  connectionString: string;
  config: ConnectionInfo;
  handle: DbHandle;
  start: () => Promise<void>;
  stop: () => Promise<void>;
}

/**
 * Create a fixture helper for use in beforeAll/afterAll hooks.
 */
export function createTestHelper(context?: FixtureContext): TestHelper {
  let current: DbHandle | null = null;

  const handle = (): DbHandle => {
    if (current === null) {
      throw new PgFixtureError('Fixture not created. Call start() first.');
    }
    return current;
  };

  return {
    get connectionString() {
      return handle().connectionString;
    },
    get config() {
      return handle().config;
    },
    get handle() {
      return handle();
    },
    start: async () => {
      if (current !== null) {
        throw new PgFixtureError('Fixture already created.');
      }
      current = await (context ?? getDefaultContext()).createFixture();
    },
    stop: async () => {
      const released = current;
      current = null;
      await released?.release();
    },
  };
}

type HookRegistrar = (fn: () => Promise<void>) => void;

export interface SuiteHooks {
  beforeAll: HookRegistrar;
  afterAll: HookRegistrar;
}

function globalHook(name: keyof SuiteHooks): HookRegistrar | undefined {
  const hook: unknown = Reflect.get(globalThis, name);
  if (typeof hook !== 'function') return undefined;
  return (fn) => {
    hook(fn);
  };
}

/**
 * Vitest/Jest-style hook that creates a fixture database before all tests
 * and releases it after all tests.
 *
 * Usage:
 *   const db = usePgFixture(undefined, { beforeAll, afterAll });
 *   test('...', async () => {
 *     const client = new pg.Client(db.config);
 *   });
 */
export function usePgFixture(context?: FixtureContext, hooks?: SuiteHooks): TestHelper {
  const helper = createTestHelper(context);

  const ba = hooks?.beforeAll ?? globalHook('beforeAll');
  const aa = hooks?.afterAll ?? globalHook('afterAll');

  if (ba && aa) {
    ba(() => helper.start());
    aa(() => helper.stop());
  }

  return helper;
}

export { FixtureContext, createFixture, withFixture } from './fixture.js';
export type { DbHandle } from './handle.js';
export type { ConnectionInfo } from './types.js';
