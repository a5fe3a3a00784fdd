import { describe, expect, it } from 'vitest';
import { JiraClient } from './JiraClient';
import { JiraSprintRepository } from './JiraSprintRepository';
import { JiraConfig } from '../../config';
import { FakeRoute, createFakeJiraAdapter } from '../../test/fakeJiraAdapter';

const config: JiraConfig = {
  baseURL: 'https://example.atlassian.net',
  email: 'dev@example.com',
  apiToken: 'test-token',
  boardIds: [],
  timeoutMs: 1000
};

const routes: Record<string, FakeRoute> = {
  '/rest/agile/1.0/board': () => ({
    data: { isLast: true, values: [{ id: 1, name: 'Platform', type: 'scrum' }, { id: 2, name: 'Mobile', type: 'scrum' }] }
  }),
  '/rest/agile/1.0/board/2/sprint': () => ({
    data: {
      isLast: true,
      values: [{ id: 40, name: 'Mobile 40', state: 'CLOSED', startDate: '2024-04-29T08:00:00.000Z', endDate: '2024-05-06T08:00:00.000Z' }]
    }
  })
};

function repositoryWith(boardIds: number[]): JiraSprintRepository {
  const { adapter } = createFakeJiraAdapter(routes);
  return new JiraSprintRepository(new JiraClient({ ...config, boardIds }, { adapter }));
}

describe('JiraSprintRepository', () => {
  it('lists every visible board when none are configured', async () => {
    expect(await repositoryWith([]).findBoards()).toEqual([
      { id: 1, name: 'Platform' },
      { id: 2, name: 'Mobile' }
    ]);
  });

  it('keeps only the configured boards, in configured order', async () => {
    expect(await repositoryWith([2, 9]).findBoards()).toEqual([
      { id: 2, name: 'Mobile' },
      { id: 9, name: 'Board 9' }
    ]);
  });

  it('maps board sprints to domain sprints', async () => {
    const [sprint] = await repositoryWith([]).findByBoard(2, 'closed');

    expect(sprint.id).toBe(40);
    expect(sprint.boardId).toBe(2);
    expect(sprint.isClosed).toBe(true);
    expect(sprint.window?.toString()).toBe('[2024-04-29T08:00:00.000Z, 2024-05-06T08:00:00.000Z)');
  });
});
