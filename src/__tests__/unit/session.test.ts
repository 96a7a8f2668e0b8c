import { describe, it, expect, beforeAll } from 'vitest';

import { BrowserSession } from '../../browser/session.js';
import { DriverError, LaunchError } from '../../browser/errors.js';
import { buildLaunchOptions, USER_AGENTS } from '../../browser/fingerprint.js';
import { BING } from '../../schema/config.js';
import { isAbortError } from '../../utils/clock.js';
import { setLogLevel } from '../../utils/logger.js';
import type { FakeDriverScript } from '../helpers/fakes.js';
import { FakeClock, ScriptedRandom, fakeDriverFactory } from '../helpers/fakes.js';

beforeAll(() => {
  setLogLevel('error');
});

const SETTINGS = { headless: true, driverPath: 'auto', engine: BING };

function createSession(
  scripts: ReadonlyArray<FakeDriverScript | Error> = [],
  random = new ScriptedRandom(),
) {
  const clock = new FakeClock();
  const fake = fakeDriverFactory(clock, scripts);
  const session = new BrowserSession({
    settings: SETTINGS,
    driverFactory: fake.factory,
    clock,
    random,
  });
  return { session, clock, ...fake };
}

describe('buildLaunchOptions', () => {
  it('uses the discovered browser when the driver path is auto', () => {
    const options = buildLaunchOptions(SETTINGS, new ScriptedRandom());

    expect(options).toEqual({
      headless: true,
      userAgent: USER_AGENTS[0],
      viewport: { width: 800, height: 600 },
      executablePath: undefined,
      channel: undefined,
    });
  });

  it('passes an explicit executable and channel through', () => {
    const options = buildLaunchOptions(
      { ...SETTINGS, driverPath: '/opt/edge/msedge', browserChannel: 'msedge' },
      new ScriptedRandom([0.99]),
    );

    expect(options.executablePath).toBe('/opt/edge/msedge');
    expect(options.channel).toBe('msedge');
    expect(options.userAgent).toBe(USER_AGENTS[USER_AGENTS.length - 1]);
  });
});

describe('BrowserSession.launch', () => {
  it('moves from uninitialized to ready', async () => {
    const { session, launches } = createSession();
    expect(session.state).toBe('uninitialized');

    await session.launch();

    expect(session.state).toBe('ready');
    expect(launches).toHaveLength(1);
  });

  it('wraps driver start-up failures in LaunchError', async () => {
    const { session } = createSession([new Error('spawn ENOENT')]);

    const pending = session.launch();

    await expect(pending).rejects.toBeInstanceOf(LaunchError);
    await expect(pending).rejects.toThrow('Failed to launch browser: spawn ENOENT');
    expect(session.state).toBe('uninitialized');
  });

  it('refuses a second live browser', async () => {
    const { session } = createSession();
    await session.launch();

    await expect(session.launch()).rejects.toThrow('Browser session is already running');
  });
});

describe('BrowserSession.executeSearch', () => {
  it('submits with Enter and reports the results URL', async () => {
    const { session, drivers } = createSession();
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome).toEqual({
      success: true,
      locator: 'https://www.bing.com/search?q=abc',
      executionTime: 2.25,
    });
    expect(drivers[0]?.calls).toEqual([
      'goto https://www.bing.com',
      'clear',
      'press Enter',
      'moveBy -100 -100',
      'moveBy -100 -100',
      'scrollBy 300',
      'scrollBy -150',
    ]);
    expect(session.state).toBe('ready');
  });

  it('submits by clicking the search button on the other branch', async () => {
    const { session, drivers } = createSession([], new ScriptedRandom([], 0.5));
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome.success).toBe(true);
    expect(outcome.executionTime).toBe(3.55);
    expect(drivers[0]?.calls.slice(0, 3)).toEqual([
      'goto https://www.bing.com',
      'clear',
      'click #search_icon',
    ]);
  });

  it('gives up on an unresponsive page at the 15s bound', async () => {
    const { session, drivers } = createSession([{ inputDelays: [16_000] }]);
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome).toEqual({
      success: false,
      locator: 'timeout',
      executionTime: 15,
      errorKind: 'timeout',
    });
    expect(drivers[0]?.calls).toEqual(['goto https://www.bing.com']);
    expect(session.state).toBe('ready');
  });

  it('bounds a stalled navigation by the page-state budget', async () => {
    const { session, clock, drivers } = createSession([{ gotoStallMs: 16_000 }]);
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome).toEqual({
      success: false,
      locator: 'timeout',
      executionTime: 15,
      errorKind: 'timeout',
    });
    expect(drivers[0]?.gotoTimeouts).toEqual([15_000]);
    expect(clock.sleeps).toEqual([15_000]);
    expect(session.state).toBe('ready');
  });

  it('charges navigation time against the search box wait', async () => {
    const { session } = createSession([{ gotoStallMs: 10_000, inputDelays: [6_000] }]);
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome.locator).toBe('timeout');
    expect(outcome.executionTime).toBe(15);
  });

  it('bounds a hung element lookup by the page-state budget', async () => {
    const { session, clock } = createSession([{ probeStallMs: 16_000 }]);
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome.locator).toBe('timeout');
    expect(outcome.executionTime).toBe(15);
    expect(clock.sleeps).toEqual([15_000]);
  });

  it('times out when the results container never appears', async () => {
    const { session } = createSession([{ resultsDelayMs: 60_000 }]);
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome.locator).toBe('timeout');
    // typing 750ms + submit pause 500ms + 15s wait
    expect(outcome.executionTime).toBe(16.25);
  });

  it('marks the session crashed on a session fault', async () => {
    const { session } = createSession([
      {
        failures: [
          ['goto', new DriverError('session_fault', 'Target page, context or browser has been closed')],
        ],
      },
    ]);
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome).toEqual({
      success: false,
      locator: 'error: Target page, context or browser has been closed',
      executionTime: 0,
      errorKind: 'session_fault',
    });
    expect(session.state).toBe('crashed');
  });

  it('reports page-level failures and stays ready', async () => {
    const { session } = createSession(
      [{ failures: [['click', new DriverError('element_not_found', 'no submit button')]] }],
      new ScriptedRandom([], 0.5),
    );
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome.success).toBe(false);
    expect(outcome.locator).toBe('error: no submit button');
    expect(outcome.errorKind).toBe('element_not_found');
    expect(outcome.executionTime).toBe(1.55);
    expect(session.state).toBe('ready');
  });

  it('classifies unknown errors as other', async () => {
    const { session } = createSession([{ failures: [['clear', new Error('weird')]] }]);
    await session.launch();

    const outcome = await session.executeSearch('abc');

    expect(outcome.locator).toBe('error: weird');
    expect(outcome.errorKind).toBe('other');
  });

  it('throws a session fault when there is no live browser', async () => {
    const { session } = createSession();

    await expect(session.executeSearch('abc')).rejects.toMatchObject({
      kind: 'session_fault',
    });
  });

  it('rethrows an abort and stays usable', async () => {
    const { session } = createSession();
    await session.launch();
    const controller = new AbortController();
    controller.abort();

    const error = await session
      .executeSearch('abc', controller.signal)
      .catch((err: unknown) => err);

    expect(isAbortError(error)).toBe(true);
    expect(session.state).toBe('ready');
  });
});

describe('BrowserSession.recover', () => {
  it('discards the old browser, cools down and relaunches', async () => {
    const { session, clock, drivers, launches } = createSession([
      { failures: [['goto', new DriverError('session_fault', 'browser has disconnected')]] },
      {},
    ]);
    await session.launch();
    await session.executeSearch('abc');
    expect(session.state).toBe('crashed');

    const sleepsBefore = clock.sleeps.length;
    const recovered = await session.recover();

    expect(recovered).toBe(true);
    expect(session.state).toBe('ready');
    expect(drivers[0]?.closed).toBe(true);
    expect(launches).toHaveLength(2);
    expect(clock.sleeps.slice(sleepsBefore)).toEqual([5000]);

    const outcome = await session.executeSearch('abc');
    expect(outcome.success).toBe(true);
    expect(drivers[1]?.calls[0]).toBe('goto https://www.bing.com');
  });

  it('ignores teardown errors from the dead browser', async () => {
    const { session, drivers } = createSession([
      { failures: [['close', new Error('already gone')]] },
      {},
    ]);
    await session.launch();

    await expect(session.recover()).resolves.toBe(true);
    expect(drivers[0]?.closed).toBe(false);
    expect(drivers).toHaveLength(2);
  });

  it('returns false and ends terminal when the relaunch fails', async () => {
    const { session } = createSession([{}, new Error('no display')]);
    await session.launch();

    await expect(session.recover()).resolves.toBe(false);
    expect(session.state).toBe('uninitialized');
  });
});

describe('BrowserSession.close', () => {
  it('closes the browser once', async () => {
    const { session, drivers } = createSession();
    await session.launch();

    await session.close();
    await session.close();

    expect(drivers[0]?.closed).toBe(true);
    expect(session.state).toBe('uninitialized');
  });
});
