import { IWorklogRepository } from '../domain/worklog/repositories/IWorklogRepository';
import { ISprintRepository } from '../domain/sprint/repositories/ISprintRepository';
import { SprintSelector } from '../domain/sprint/services/SprintSelector';
import { WorklogAggregator } from '../domain/kpi/services/WorklogAggregator';
import { ReportingPeriodResolver } from '../application/services/ReportingPeriodResolver';
import { BuildWorklogReportUseCase } from '../application/use-cases/BuildWorklogReport';
import { ReportFormatter } from '../presentation/ReportFormatter';
import { CsvExporter } from '../presentation/CsvExporter';
import { AppConfig, loadConfig } from '../config';
import { JiraClient, JiraClientOptions } from './jira/JiraClient';
import { JiraWorklogRepository } from './jira/JiraWorklogRepository';
import { JiraSprintRepository } from './jira/JiraSprintRepository';
import { logger } from '../utils/logger';

/**
 * Dependency Injection Container
 * Creates and wires all dependencies lazily
 */
export class Container {
  private static instance: Container | null = null;

  private _config: AppConfig | null = null;
  private _jiraClient: JiraClient | null = null;
  private _worklogRepository: IWorklogRepository | null = null;
  private _sprintRepository: ISprintRepository | null = null;
  private _aggregator: WorklogAggregator | null = null;

  constructor(
    private readonly configOverride?: AppConfig,
    private readonly clientOptions: JiraClientOptions = {},
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Get singleton instance
   */
  static getInstance(): Container {
    if (!Container.instance) {
      Container.instance = new Container();
      logger.debug('DI Container initialized');
    }
    return Container.instance;
  }

  get config(): AppConfig {
    if (!this._config) {
      this._config = this.configOverride ?? loadConfig();
    }
    return this._config;
  }

  // Infrastructure
  get jiraClient(): JiraClient {
    if (!this._jiraClient) {
      this._jiraClient = new JiraClient(this.config.jira, this.clientOptions);
    }
    return this._jiraClient;
  }

  // Repositories
  get worklogRepository(): IWorklogRepository {
    if (!this._worklogRepository) {
      this._worklogRepository = new JiraWorklogRepository(this.jiraClient, this.config.timeTracking);
    }
    return this._worklogRepository;
  }

  get sprintRepository(): ISprintRepository {
    if (!this._sprintRepository) {
      this._sprintRepository = new JiraSprintRepository(this.jiraClient);
    }
    return this._sprintRepository;
  }

  // Domain Services
  get aggregator(): WorklogAggregator {
    if (!this._aggregator) {
      this._aggregator = new WorklogAggregator();
    }
    return this._aggregator;
  }

  // Use Cases
  get buildWorklogReportUseCase(): BuildWorklogReportUseCase {
    return new BuildWorklogReportUseCase(
      this.worklogRepository,
      new ReportingPeriodResolver(this.sprintRepository, new SprintSelector(), this.clock),
      this.aggregator
    );
  }

  // Presentation
  get reportFormatter(): ReportFormatter {
    return new ReportFormatter();
  }

  get csvExporter(): CsvExporter {
    return new CsvExporter();
  }
}

// Convenience function
export const container = () => Container.getInstance();
