import { Sprint, SprintState } from '../entities/Sprint';

/**
 * Repository Interface for Sprints
 */
export interface ISprintRepository {
  /**
   * Boards to scan for sprints (the configured ones, or every visible board)
   */
  findBoards(): Promise<BoardReference[]>;

  /**
   * Find the sprints of a board, optionally restricted to one state
   */
  findByBoard(boardId: number, state?: SprintState): Promise<Sprint[]>;
}

export interface BoardReference {
  id: number;
  name: string;
}
