import { describe, expect, it } from 'vitest';
import { ConfigurationError, loadConfig } from './index';

const baseEnv = {
  JIRA_SERVER: 'https://example.atlassian.net/',
  JIRA_USERNAME: 'dev@example.com',
  JIRA_API_TOKEN: 'test-token'
};

describe('loadConfig', () => {
  it('reads the required variables and applies defaults', () => {
    const config = loadConfig(baseEnv);

    expect(config).toEqual({
      jira: {
        baseURL: 'https://example.atlassian.net',
        email: 'dev@example.com',
        apiToken: 'test-token',
        boardIds: [],
        timeoutMs: 30000
      },
      timeTracking: { hoursPerDay: 8, daysPerWeek: 5 }
    });
  });

  it('lists every missing variable', () => {
    expect(() => loadConfig({ JIRA_SERVER: 'https://example.atlassian.net' })).toThrow(
      'Missing Jira configuration: JIRA_USERNAME, JIRA_API_TOKEN'
    );
  });

  it('parses board ids and time tracking overrides', () => {
    const config = loadConfig({
      ...baseEnv,
      JIRA_BOARD_ID: '12, 34',
      JIRA_HOURS_PER_DAY: '7.5',
      JIRA_DAYS_PER_WEEK: '4'
    });

    expect(config.jira.boardIds).toEqual([12, 34]);
    expect(config.timeTracking).toEqual({ hoursPerDay: 7.5, daysPerWeek: 4 });
  });

  it('rejects a malformed board id', () => {
    expect(() => loadConfig({ ...baseEnv, JIRA_BOARD_ID: '12,abc' })).toThrow(ConfigurationError);
  });

  it('rejects a non-positive number', () => {
    expect(() => loadConfig({ ...baseEnv, JIRA_TIMEOUT_MS: '0' })).toThrow(
      'JIRA_TIMEOUT_MS must be a positive number, got "0"'
    );
  });
});
