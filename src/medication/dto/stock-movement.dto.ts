import { IsDateString, IsInt, IsOptional, Min } from 'class-validator';

export class StockMovementDto {
  @IsInt()
  @Min(1)
  quantity!: number;

  // Restock only; defaults to today.
  @IsOptional()
  @IsDateString()
  date?: string;
}
