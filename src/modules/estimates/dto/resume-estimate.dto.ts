import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsObject,
  IsString,
  ValidateNested,
} from 'class-validator';

import type { RawRow } from '../interfaces';
import { ColumnSelectionDto } from './column-selection.dto';
import { CategoryRuleDto, ContractorDto } from './contractor.dto';

export class RawTableDto {
  @IsArray()
  @IsString({ each: true })
  columns!: string[];

  @IsArray()
  @IsObject({ each: true })
  rows!: RawRow[];
}

export class ResumeEstimateDto {
  @ValidateNested()
  @Type(() => RawTableDto)
  table!: RawTableDto;

  @ValidateNested()
  @Type(() => ColumnSelectionDto)
  columns!: ColumnSelectionDto;

  @IsArray()
  @ArrayMinSize(1, { message: 'At least one contractor is required' })
  @ArrayMaxSize(5, { message: 'At most 5 contractors are supported' })
  @ValidateNested({ each: true })
  @Type(() => ContractorDto)
  contractors!: ContractorDto[];

  @IsArray()
  @ArrayMaxSize(10, { message: 'At most 10 category rules are supported' })
  @ValidateNested({ each: true })
  @Type(() => CategoryRuleDto)
  rules: CategoryRuleDto[] = [];
}
