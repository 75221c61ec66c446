import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validate } from 'class-validator';
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import * as path from 'path';

import { ConfigValidationError } from '../../common/errors/index.js';
import type { MonitoredPair } from '../../common/types/index.js';
import { RatioPairDto, RatioPairsConfigDto } from './dto/ratio-pair.dto.js';

/**
 * Loads the monitored pairs from YAML once at startup. The list is
 * read-only afterwards.
 */
@Injectable()
export class RatioPairsLoaderService implements OnModuleInit {
  private readonly logger = new Logger(RatioPairsLoaderService.name);
  private pairs: readonly MonitoredPair[] = [];

  constructor(private readonly configService: ConfigService) {}

  async onModuleInit(): Promise<void> {
    const configPath = this.resolveConfigPath();
    const rawContent = this.readConfigFile(configPath);
    const parsed = this.parseYaml(rawContent, configPath);
    const dtos = await this.validatePairs(parsed);
    this.pairs = Object.freeze(dtos.map((dto) => this.toMonitoredPair(dto)));
    this.logger.log({
      message: `Ratio pairs loaded: ${this.pairs.length} pairs from ${configPath}`,
      module: 'ratio-pairs',
      pairs: this.pairs.map((p) => p.name),
    });
  }

  getPairs(): readonly MonitoredPair[] {
    return this.pairs;
  }

  findPair(name: string): MonitoredPair | undefined {
    return this.pairs.find((pair) => pair.name === name);
  }

  private resolveConfigPath(): string {
    const configPath = this.configService.get<string>(
      'RATIO_PAIRS_CONFIG_PATH',
      'config/ratio-pairs.yaml',
    );
    return path.resolve(process.cwd(), configPath);
  }

  private readConfigFile(configPath: string): string {
    if (!fs.existsSync(configPath)) {
      throw new ConfigValidationError(
        `Ratio pairs config file not found: ${configPath}`,
        [`File not found: ${configPath}`],
      );
    }
    return fs.readFileSync(configPath, 'utf-8');
  }

  private parseYaml(content: string, configPath: string): object {
    let result: unknown;
    try {
      result = yaml.load(content);
    } catch (error) {
      const message =
        error instanceof Error ? error.message : 'Unknown YAML parse error';
      throw new ConfigValidationError(
        `Failed to parse YAML config at ${configPath}: ${message}`,
        [message],
      );
    }
    if (result == null || typeof result !== 'object') {
      throw new ConfigValidationError(
        `Failed to parse YAML config at ${configPath}: file is empty or does not contain a valid object`,
        ['YAML content is empty or not an object'],
      );
    }
    return result;
  }

  private async validatePairs(parsed: object): Promise<RatioPairDto[]> {
    const configDto = plainToInstance(RatioPairsConfigDto, parsed);

    if (!Array.isArray(configDto.pairs) || configDto.pairs.length === 0) {
      throw new ConfigValidationError(
        'Ratio pairs config must contain at least one pair',
        ['Ratio pairs config must contain at least one pair'],
      );
    }

    const allErrors: string[] = [];
    for (const [i, pairDto] of configDto.pairs.entries()) {
      if (!(pairDto instanceof RatioPairDto)) {
        allErrors.push(`Pair[${i}]: must be a mapping`);
        continue;
      }
      const errors = await validate(pairDto);
      for (const error of errors) {
        const constraints = error.constraints
          ? Object.values(error.constraints).join(', ')
          : 'unknown validation error';
        allErrors.push(`Pair[${i}].${error.property}: ${constraints}`);
      }
    }

    allErrors.push(
      ...RatioPairsConfigDto.validateCrossPairRules(
        configDto.pairs.filter((p) => p instanceof RatioPairDto),
      ),
    );

    if (allErrors.length > 0) {
      throw new ConfigValidationError(
        `Ratio pairs config validation failed with ${allErrors.length} error(s)`,
        allErrors,
      );
    }

    return configDto.pairs;
  }

  private toMonitoredPair(dto: RatioPairDto): MonitoredPair {
    return {
      name: dto.name,
      symbolA: dto.symbolA,
      symbolB: dto.symbolB,
      analysisVolume: dto.analysisVolume,
    };
  }
}
