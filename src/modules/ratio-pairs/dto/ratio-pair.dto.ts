import {
  IsString,
  IsNotEmpty,
  IsOptional,
  IsNumber,
  IsPositive,
  Matches,
  ValidateNested,
  IsArray,
} from 'class-validator';
import { Type } from 'class-transformer';

const SYMBOL_PATTERN = /^[A-Z0-9]+$/;

export class RatioPairDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @Matches(SYMBOL_PATTERN, {
    message: 'symbolA must be an upper-case exchange symbol (e.g. BTCUSDT)',
  })
  symbolA!: string;

  @IsString()
  @Matches(SYMBOL_PATTERN, {
    message: 'symbolB must be an upper-case exchange symbol (e.g. ETHUSDT)',
  })
  symbolB!: string;

  @IsOptional()
  @IsNumber({ allowNaN: false, allowInfinity: false })
  @IsPositive()
  analysisVolume?: number;
}

export class RatioPairsConfigDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RatioPairDto)
  pairs!: RatioPairDto[];

  /**
   * Cross-pair rules class-validator cannot express: unique names and
   * distinct legs within a pair.
   */
  static validateCrossPairRules(pairs: RatioPairDto[]): string[] {
    const errors: string[] = [];
    const names = new Set<string>();

    for (const pair of pairs) {
      if (names.has(pair.name)) {
        errors.push(`Duplicate pair name: ${pair.name}`);
      }
      names.add(pair.name);

      if (pair.symbolA === pair.symbolB) {
        errors.push(
          `Pair ${pair.name}: symbolA and symbolB must differ (${pair.symbolA})`,
        );
      }
    }

    return errors;
  }
}
