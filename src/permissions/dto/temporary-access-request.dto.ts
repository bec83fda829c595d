import { Type } from 'class-transformer';
import {
  ArrayNotEmpty,
  IsArray,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  MaxLength,
  Min,
} from 'class-validator';
import { PermissionType } from '../domain/enums/permission-type.enum';

export class TemporaryAccessRequestDto {
  @IsString()
  @IsNotEmpty()
  principalName!: string;

  @IsString()
  @IsNotEmpty()
  principalHost!: string;

  @IsArray()
  @ArrayNotEmpty()
  @IsString({ each: true })
  resourceNames!: string[];

  @IsArray()
  @ArrayNotEmpty()
  @IsEnum(PermissionType, { each: true })
  permissionTypes!: PermissionType[];

  @Type(() => Number)
  @IsInt()
  @Min(1)
  durationDays!: number;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  description?: string;
}
