import { Type } from 'class-transformer';
import {
  IsArray,
  IsInt,
  IsLatitude,
  IsLongitude,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { MAX_RAW_TIMESTAMP } from '@milemark/tracker';

export class InreachAddressDto {
  @IsString()
  address!: string;
}

export class InreachPointDto {
  @IsOptional()
  @IsLatitude()
  latitude?: number;

  @IsOptional()
  @IsLongitude()
  longitude?: number;

  @IsOptional()
  @IsNumber()
  altitude?: number;

  @IsOptional()
  @IsInt()
  gpsFix?: number;

  @IsOptional()
  @IsNumber()
  course?: number;

  @IsOptional()
  @IsNumber()
  speed?: number;
}

export class InreachStatusDto {
  @IsOptional()
  @IsInt()
  autonomous?: number;

  @IsOptional()
  @IsInt()
  lowBattery?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  intervalChange?: number;

  @IsOptional()
  @IsInt()
  resetDetected?: number;
}

export class InreachEventDto {
  @IsOptional()
  @IsString()
  imei?: string;

  @IsOptional()
  @IsInt()
  messageCode?: number;

  @IsOptional()
  @IsString()
  freeText?: string;

  @IsOptional()
  @IsNumber()
  @Min(0)
  @Max(MAX_RAW_TIMESTAMP)
  timeStamp?: number;

  @IsOptional()
  @IsString()
  transportMode?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => InreachAddressDto)
  addresses?: InreachAddressDto[];

  @IsOptional()
  @ValidateNested()
  @Type(() => InreachPointDto)
  point?: InreachPointDto;

  @IsOptional()
  @ValidateNested()
  @Type(() => InreachStatusDto)
  status?: InreachStatusDto;
}

/** Body of a Garmin inReach IPC outbound post */
export class InreachPayloadDto {
  @IsOptional()
  @IsString()
  Version?: string;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => InreachEventDto)
  Events!: InreachEventDto[];
}
