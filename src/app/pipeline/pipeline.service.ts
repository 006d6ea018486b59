import { Injectable } from '@nestjs/common';
import {
  describeCause,
  PipelineError,
  PipelineStageName,
  TransformError,
} from '../../common/errors/pipeline.errors';
import { LoggerService } from '../../common/services/logger.service';
import { BreweryApiCollectorService } from '../extract/collectors/brewery-api.collector';
import { BronzeWriterService } from '../extract/writers/bronze-writer.service';
import {
  BronzeSnapshot,
  GoldArtifacts,
  GoldTables,
  RawPage,
  SilverStats,
  SilverTable,
} from '../interfaces/brewery.interface';
import { DimensionalModelerService } from '../model/dimensional-modeler.service';
import { GoldWriterService } from '../model/gold-writer.service';
import { CleansingService } from '../transform/cleansing.service';

export interface PipelineResult {
  runId: string;
  duration: number;
  bronze: BronzeSnapshot;
  silver: { path: string; stats: SilverStats };
  gold: GoldArtifacts;
}

/** Outputs handed from one stage to the next */
export interface RunState {
  pages?: RawPage[];
  bronze?: BronzeSnapshot;
  silver?: SilverTable;
  gold?: GoldTables;
  artifacts?: GoldArtifacts;
}

export interface PipelineStage {
  name: PipelineStageName;
  /** Reads its input from `state`, stores its output there and returns a log summary */
  run(state: RunState): Promise<Record<string, unknown>>;
}

function produced<T>(value: T | undefined, what: string, stage: PipelineStageName): T {
  if (value === undefined) {
    throw new TransformError(stage, `No ${what} available for ${stage}`);
  }
  return value;
}

/**
 * Pipeline
 * Runs the stage list once, in order, aborting on the first failure.
 * Nothing after extract is retried: its input is already persisted.
 */
@Injectable()
export class PipelineService {
  constructor(
    private readonly collector: BreweryApiCollectorService,
    private readonly bronzeWriter: BronzeWriterService,
    private readonly cleansing: CleansingService,
    private readonly modeler: DimensionalModelerService,
    private readonly goldWriter: GoldWriterService,
    private readonly logger: LoggerService,
  ) {
    this.logger.setContext(PipelineService.name);
  }

  stages(): PipelineStage[] {
    return [
      {
        name: 'extract',
        run: async (state) => {
          const pages = await this.collector.fetchAll();
          state.pages = pages;
          return {
            pages: pages.length,
            records: pages.reduce((sum, page) => sum + page.records.length, 0),
          };
        },
      },
      {
        name: 'land',
        run: async (state) => {
          const bronze = await this.bronzeWriter.write(produced(state.pages, 'pages', 'land'));
          state.bronze = bronze;
          return { records: bronze.recordCount, path: bronze.path };
        },
      },
      {
        name: 'cleanse',
        run: async (state) => {
          const silver = await this.cleansing.cleanse(
            produced(state.bronze, 'bronze snapshot', 'cleanse'),
          );
          state.silver = silver;
          return { ...silver.stats, path: silver.path };
        },
      },
      {
        name: 'model',
        run: async (state) => {
          const gold = this.modeler.model(produced(state.silver, 'silver table', 'model'));
          state.gold = gold;
          return {
            facts: gold.factBreweries.length,
            locations: gold.dimLocation.length,
            breweryTypes: gold.dimBreweryType.length,
          };
        },
      },
      {
        name: 'publish',
        run: async (state) => {
          const artifacts = await this.goldWriter.write(
            produced(state.gold, 'gold tables', 'publish'),
          );
          state.artifacts = artifacts;
          return { files: Object.values(artifacts).map((artifact) => artifact.path) };
        },
      },
    ];
  }

  async run(runId: string = new Date().toISOString()): Promise<PipelineResult> {
    const startTime = Date.now();
    const state: RunState = {};

    for (const stage of this.stages()) {
      await this.execute(runId, stage, state);
    }

    const duration = Date.now() - startTime;
    this.logger.logPerformance('pipeline.run', duration, { runId });

    const silver = produced(state.silver, 'silver table', 'publish');
    return {
      runId,
      duration,
      bronze: produced(state.bronze, 'bronze snapshot', 'publish'),
      silver: { path: silver.path, stats: silver.stats },
      gold: produced(state.artifacts, 'gold artifacts', 'publish'),
    };
  }

  private async execute(runId: string, stage: PipelineStage, state: RunState): Promise<void> {
    const startTime = Date.now();
    this.logger.logStageStart(stage.name, runId);

    try {
      const summary = await stage.run(state);
      this.logger.logStageComplete(stage.name, runId, Date.now() - startTime, summary);
    } catch (error) {
      const failure =
        error instanceof PipelineError
          ? error
          : new TransformError(
              stage.name,
              `Unexpected failure in ${stage.name}: ${describeCause(error)}`,
              { cause: error },
            );
      this.logger.logStageFailed(stage.name, runId, failure, Date.now() - startTime);
      throw failure;
    }
  }
}
