import { plainToInstance, Type } from 'class-transformer';
import { IsBooleanString, IsIn, IsNumber, IsOptional, IsString, Max, Min, validateSync } from 'class-validator';

export class EnvironmentVariables {
  @IsOptional()
  @IsString()
  DATABASE_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  @Max(65535)
  DATABASE_PORT?: number;

  @IsOptional()
  @IsString()
  DATABASE_USER?: string;

  @IsOptional()
  @IsString()
  DATABASE_PASSWORD?: string;

  @IsOptional()
  @IsString()
  DATABASE_NAME?: string;

  @IsOptional()
  @IsString()
  REDIS_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(1)
  @Max(65535)
  REDIS_PORT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  PORT?: number;

  @IsOptional()
  @IsString()
  NODE_ENV?: string;

  @IsOptional()
  @IsIn(['caltopo', 'gpx'])
  MAP_PROVIDER?: string;

  @IsOptional()
  @IsString()
  CALTOPO_MAP_ID?: string;

  @IsOptional()
  @IsString()
  CALTOPO_CREDENTIAL_ID?: string;

  @IsOptional()
  @IsString()
  CALTOPO_KEY?: string;

  @IsOptional()
  @IsString()
  GPX_FILE?: string;

  @IsOptional()
  @IsIn(['caltopo', 'openmeteo', 'none'])
  ELEVATION_PROVIDER?: string;

  @IsOptional()
  @IsBooleanString()
  MARKER_UPDATES?: string;

  @IsOptional()
  @IsString()
  RACE_CONFIG_PATH?: string;

  @IsOptional()
  @IsString()
  TRACKER_API_TOKEN?: string;
}

export function validate(config: Record<string, unknown>) {
  const validatedConfig = plainToInstance(EnvironmentVariables, config, {
    enableImplicitConversion: true,
  });
  const errors = validateSync(validatedConfig, { skipMissingProperties: false });

  if (errors.length > 0) {
    throw new Error(errors.toString());
  }
  if (validatedConfig.MAP_PROVIDER !== 'gpx' && !validatedConfig.CALTOPO_MAP_ID) {
    throw new Error('CALTOPO_MAP_ID is required when MAP_PROVIDER is caltopo');
  }
  return validatedConfig;
}
