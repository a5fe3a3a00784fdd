/**
 * Runtime configuration read from the environment (.env is loaded by the CLI)
 */
export interface AppConfig {
  jira: JiraConfig;
  timeTracking: TimeTrackingConfig;
}

export interface JiraConfig {
  baseURL: string;
  email: string;
  apiToken: string;
  boardIds: number[];
  timeoutMs: number;
}

export interface TimeTrackingConfig {
  hoursPerDay: number;
  daysPerWeek: number;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const baseURL = env.JIRA_SERVER?.trim();
  const email = env.JIRA_USERNAME?.trim();
  const apiToken = env.JIRA_API_TOKEN?.trim();

  const missing = [
    ['JIRA_SERVER', baseURL],
    ['JIRA_USERNAME', email],
    ['JIRA_API_TOKEN', apiToken]
  ].filter(([, value]) => !value).map(([name]) => name);

  if (!baseURL || !email || !apiToken) {
    throw new ConfigurationError(`Missing Jira configuration: ${missing.join(', ')}`);
  }

  return {
    jira: {
      baseURL: baseURL.replace(/\/+$/, ''),
      email,
      apiToken,
      boardIds: parseBoardIds(env.JIRA_BOARD_ID),
      timeoutMs: parsePositiveNumber('JIRA_TIMEOUT_MS', env.JIRA_TIMEOUT_MS, 30000)
    },
    timeTracking: {
      hoursPerDay: parsePositiveNumber('JIRA_HOURS_PER_DAY', env.JIRA_HOURS_PER_DAY, 8),
      daysPerWeek: parsePositiveNumber('JIRA_DAYS_PER_WEEK', env.JIRA_DAYS_PER_WEEK, 5)
    }
  };
}

function parseBoardIds(raw: string | undefined): number[] {
  if (!raw?.trim()) return [];

  return raw.split(',').map(part => {
    const id = parseInt(part.trim(), 10);
    if (isNaN(id) || id <= 0) {
      throw new ConfigurationError(`JIRA_BOARD_ID contains an invalid board id: "${part.trim()}"`);
    }
    return id;
  });
}

function parsePositiveNumber(name: string, raw: string | undefined, fallback: number): number {
  if (!raw?.trim()) return fallback;

  const value = parseFloat(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive number, got "${raw}"`);
  }
  return value;
}
