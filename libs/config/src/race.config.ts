import { readFileSync } from 'node:fs';
import { ConfigType, registerAs } from '@nestjs/config';
import { plainToInstance, Type } from 'class-transformer';
import {
  ArrayUnique,
  IsArray,
  IsISO8601,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  IsTimeZone,
  Min,
  ValidateNested,
  validateSync,
} from 'class-validator';
import { isRecord } from '@milemark/common';

export const DEFAULT_RACE_CONFIG_PATH = 'config/race.json';

export class AidStationConfigDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsNumber()
  @Min(0)
  mileMark!: number;

  @IsOptional()
  @IsString()
  comments?: string;
}

export class RaceConfigDto {
  @IsString()
  @IsNotEmpty()
  raceName!: string;

  /** Must carry an explicit UTC offset, e.g. 2024-07-19T06:00:00-06:00 */
  @IsISO8601({ strict: true })
  startTime!: string;

  @IsTimeZone()
  timezone!: string;

  @IsString()
  @IsNotEmpty()
  routeName!: string;

  @IsString()
  @IsNotEmpty()
  runnerName!: string;

  @IsArray()
  @ArrayUnique((station: AidStationConfigDto) => station.name)
  @ValidateNested({ each: true })
  @Type(() => AidStationConfigDto)
  aidStations!: AidStationConfigDto[];

  @IsOptional()
  @IsNumber()
  @Min(0)
  minSpacingFt?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  maxSpacingFt?: number;

  @IsOptional()
  @IsNumber()
  @IsPositive()
  minPlausiblePace?: number;
}

export class RaceConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RaceConfigError';
  }
}

const EXPLICIT_OFFSET = /(Z|[+-]\d{2}:?\d{2})$/;

export function parseRaceConfig(raw: unknown): RaceConfigDto {
  if (!isRecord(raw)) {
    throw new RaceConfigError('Race config must be a JSON object');
  }
  const config = plainToInstance(RaceConfigDto, raw);
  const errors = validateSync(config, { whitelist: true, forbidNonWhitelisted: true });
  if (errors.length > 0) {
    throw new RaceConfigError(errors.toString());
  }
  if (!EXPLICIT_OFFSET.test(config.startTime)) {
    throw new RaceConfigError(`startTime "${config.startTime}" needs a UTC offset`);
  }
  return config;
}

export function loadRaceConfig(path: string): RaceConfigDto {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new RaceConfigError(`Cannot read race config ${path}: ${message}`);
  }
  return parseRaceConfig(raw);
}

export const raceConfig = registerAs('race', () =>
  loadRaceConfig(process.env.RACE_CONFIG_PATH || DEFAULT_RACE_CONFIG_PATH),
);

export type RaceConfig = ConfigType<typeof raceConfig>;
