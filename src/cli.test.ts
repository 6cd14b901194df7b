/**
 * Tests for CLI entry point
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import http from 'http';
import { Webhooks } from '@octokit/webhooks';
import { main } from './cli';
import { createApp } from './index';
import { PullRequestProcessor } from './components/pull-request-processor';
import { PolicyStore } from './components/policy-store';
import { FakePlatform, FakeTracker } from './testing/fakes';

vi.mock('./index', () => ({
  APP_NAME: 'pr-issue-gate',
  APP_VERSION: '0.1.0',
  createApp: vi.fn()
}));

vi.mock('http', () => {
  const createServer = vi.fn(() => ({ listen: vi.fn(), close: vi.fn() }));
  return { default: { createServer }, createServer };
});

vi.mock('./utils/logger');

const validEnv: Record<string, string> = {
  REDMINE_URL: 'https://redmine.example.test',
  WEBHOOK_SECRET: 'test-secret',
  GITHUB_TOKEN: 'test-token',
  REDMINE_API_KEY: 'test-key',
  PORT: '4000'
};

describe('CLI Entry Point', () => {
  let exitSpy: MockInstance<typeof process.exit>;
  let consoleErrorSpy: MockInstance<typeof console.error>;
  let signalListeners: Map<NodeJS.Signals, Function[]>;

  beforeEach(() => {
    vi.clearAllMocks();
    for (const name of [
      'REDMINE_URL',
      'WEBHOOK_SECRET',
      'WEBHOOK_SECRET_ARN',
      'GITHUB_TOKEN',
      'GITHUB_TOKEN_ARN',
      'REDMINE_API_KEY',
      'REDMINE_API_KEY_ARN',
      'PORT',
      'RETRY_DELAY_MS'
    ]) {
      vi.stubEnv(name, '');
    }
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    signalListeners = new Map((['SIGTERM', 'SIGINT'] satisfies NodeJS.Signals[]).map(signal => [signal, process.listeners(signal)]));
  });

  afterEach(() => {
    for (const [signal, before] of signalListeners) {
      for (const listener of process.listeners(signal)) {
        if (!before.includes(listener)) {
          process.removeListener(signal, listener);
        }
      }
    }
    vi.unstubAllEnvs();
    exitSpy.mockRestore();
    consoleErrorSpy.mockRestore();
  });

  it('should exit with code 1 and list every configuration problem', async () => {
    await expect(main()).rejects.toThrow('process.exit called');

    expect(exitSpy).toHaveBeenCalledWith(1);
    expect(consoleErrorSpy).toHaveBeenNthCalledWith(
      1,
      'ERROR: REDMINE_URL is required; WEBHOOK_SECRET or WEBHOOK_SECRET_ARN is required; ' +
        'GITHUB_TOKEN or GITHUB_TOKEN_ARN is required; REDMINE_API_KEY or REDMINE_API_KEY_ARN is required'
    );
    expect(createApp).not.toHaveBeenCalled();
  });

  it('should start the webhook listener on the configured port', async () => {
    for (const [name, value] of Object.entries(validEnv)) {
      vi.stubEnv(name, value);
    }
    const webhooks = new Webhooks({ secret: 'test-secret' });
    const processor = new PullRequestProcessor({
      platform: new FakePlatform(),
      tracker: new FakeTracker(),
      policies: new PolicyStore(new Map()),
      users: new Map()
    });
    vi.mocked(createApp).mockResolvedValue({ webhooks, processor });

    await main();

    expect(createApp).toHaveBeenCalledWith(expect.objectContaining({
      port: 4000,
      webhookSecret: { kind: 'value', value: 'test-secret' }
    }));
    const server = vi.mocked(http.createServer).mock.results[0]?.value;
    expect(server.listen).toHaveBeenCalledWith(4000, expect.any(Function));
    expect(exitSpy).not.toHaveBeenCalled();
  });
});
