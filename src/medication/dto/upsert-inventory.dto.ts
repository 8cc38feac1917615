import { IsInt, IsOptional, Min } from 'class-validator';

export class UpsertInventoryDto {
  @IsOptional()
  @IsInt()
  @Min(0)
  quantityOnHand?: number;

  @IsOptional()
  @IsInt()
  @Min(0)
  reorderLevel?: number;
}
