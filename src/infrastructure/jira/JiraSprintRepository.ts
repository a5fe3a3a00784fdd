import { BoardReference, ISprintRepository } from '../../domain/sprint/repositories/ISprintRepository';
import { Sprint, SprintState } from '../../domain/sprint/entities/Sprint';
import { JiraClient } from './JiraClient';
import { SprintMapper } from './mappers/SprintMapper';
import { logger } from '../../utils/logger';

/**
 * Jira implementation of Sprint Repository
 */
export class JiraSprintRepository implements ISprintRepository {

  constructor(private readonly jiraClient: JiraClient) {}

  async findBoards(): Promise<BoardReference[]> {
    const boards = await this.jiraClient.getBoards();
    const configured = this.jiraClient.configuredBoardIds;

    if (configured.length === 0) {
      return boards.map(b => ({ id: b.id, name: b.name }));
    }

    const byId = new Map(boards.map(b => [b.id, b]));
    return configured.map(id => {
      const board = byId.get(id);
      if (!board) {
        logger.warn(`Configured board ${id} is not visible to this user`);
      }
      return { id, name: board?.name ?? `Board ${id}` };
    });
  }

  async findByBoard(boardId: number, state?: SprintState): Promise<Sprint[]> {
    const jiraSprints = await this.jiraClient.getBoardSprints(boardId, state);
    return SprintMapper.toDomainList(jiraSprints, boardId);
  }
}
