import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBase64,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

import { ColumnSelectionDto } from './column-selection.dto';
import { CategoryRuleDto, ContractorDto } from './contractor.dto';

export class AnalyzeEstimateDto {
  @IsBase64()
  buffer!: string;

  @IsString()
  filename!: string;

  @IsString()
  mimetype!: string;

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

  @IsOptional()
  @ValidateNested()
  @Type(() => ColumnSelectionDto)
  columns?: ColumnSelectionDto;
}
