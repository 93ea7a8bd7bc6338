import { IsBoolean, IsIn, IsOptional, IsString, MinLength } from 'class-validator';
import type { TieBreak } from '@shared/contracts/recommendations';

export class RecommendationDto {
  @IsString()
  @MinLength(1)
  commanderName!: string;

  @IsOptional()
  @IsBoolean()
  useCollection?: boolean;

  @IsOptional()
  @IsIn(['name', 'random'])
  tieBreak?: TieBreak;
}
