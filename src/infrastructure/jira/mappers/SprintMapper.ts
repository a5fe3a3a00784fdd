import { Sprint } from '../../../domain/sprint/entities/Sprint';
import { JiraSprint } from '../JiraClient';

/**
 * Mapper to convert Jira API responses to Sprint domain entities
 */
export class SprintMapper {

  static toDomain(jiraSprint: JiraSprint, boardId: number): Sprint {
    return Sprint.create({
      id: jiraSprint.id,
      name: jiraSprint.name,
      state: jiraSprint.state,
      startDate: jiraSprint.startDate,
      endDate: jiraSprint.endDate,
      boardId
    });
  }

  static toDomainList(jiraSprints: JiraSprint[], boardId: number): Sprint[] {
    return jiraSprints.map(s => this.toDomain(s, boardId));
  }
}
