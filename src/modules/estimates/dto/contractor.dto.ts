import { IsIn, IsNotEmpty, IsNumber, IsString, Max, Min } from 'class-validator';

import { CATEGORIES } from '../interfaces';
import type { Category } from '../interfaces';

export class ContractorDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsNumber({ allowNaN: false, allowInfinity: false })
  @Min(0)
  @Max(1)
  payoutFraction!: number;
}

export class CategoryRuleDto {
  @IsIn(CATEGORIES)
  category!: Category;

  @IsString()
  @IsNotEmpty()
  assignee!: string;
}
