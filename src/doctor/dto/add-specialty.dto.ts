import { IsInt, Min } from 'class-validator';

export class AddSpecialtyDto {
  @IsInt()
  @Min(1)
  specialtyId!: number;
}
