import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { DataSource } from '../interfaces/data-source.interface';
import { SourceBatch } from '../interfaces/raw-record.interface';
import { MappedBatch, SourceMapper } from '../interfaces/source-mapper.interface';
import {
  EpicMapper,
  GogMapper,
  HumbleMapper,
  InstantGamingMapper,
  MetacriticMapper,
  RawgMapper,
  SteamMapper,
} from '../mappers';
import { UnknownSourceException } from '../exceptions';

/**
 * Service for renaming raw columns of every source batch.
 * Uses the Strategy pattern to delegate to source-specific mappers.
 */
@Injectable()
export class SourceMappingService implements OnModuleInit {
  private readonly logger = new Logger(SourceMappingService.name);
  private readonly mappers: Map<string, SourceMapper> = new Map();

  onModuleInit(): void {
    this.registerDefaultMappers();
    this.logger.log(`SourceMappingService initialized with ${this.mappers.size} mappers`);
  }

  /**
   * Register all default mappers
   */
  private registerDefaultMappers(): void {
    this.registerMapper(new SteamMapper());
    this.registerMapper(new GogMapper());
    this.registerMapper(new InstantGamingMapper());
    this.registerMapper(new RawgMapper());
    this.registerMapper(new MetacriticMapper());
    this.registerMapper(new HumbleMapper());
    this.registerMapper(new EpicMapper());
  }

  /**
   * Register a new mapper (for extensibility)
   */
  registerMapper(mapper: SourceMapper): void {
    this.mappers.set(mapper.name, mapper);
    this.logger.debug(`Registered mapper: ${mapper.name}`);
  }

  /**
   * Get all registered mappers
   */
  getMappers(): SourceMapper[] {
    return Array.from(this.mappers.values());
  }

  /**
   * Find the mapper for a batch label, matching the enum value as well
   * as each mapper's own identifiers
   */
  findMapper(label: string): SourceMapper | null {
    for (const mapper of this.mappers.values()) {
      if (mapper.source === label || mapper.canMap(label)) {
        return mapper;
      }
    }
    return null;
  }

  /**
   * Resolve a batch label to its DataSource
   * @throws UnknownSourceException if no mapper answers to the label
   */
  resolveSource(label: string): DataSource {
    return this.requireMapper(label).source;
  }

  /**
   * Rename the columns of one batch
   * @throws UnknownSourceException if no mapper answers to the label
   */
  mapBatch(batch: SourceBatch): MappedBatch {
    const mapper = this.requireMapper(batch.source);

    this.logger.debug(
      `Mapping ${batch.records.length} records from ${batch.source} using ${mapper.name}`,
    );

    return {
      source: mapper.source,
      records: mapper.mapMany(batch.records),
    };
  }

  private requireMapper(label: string): SourceMapper {
    const mapper = this.findMapper(label);
    if (!mapper) {
      throw new UnknownSourceException(label);
    }
    return mapper;
  }
}
