import { IsString, MaxLength, Matches } from "class-validator";
import { Transform } from "class-transformer";

export class CreateProductDto {
  @IsString() @MaxLength(150) name!: string;

  @IsString() @MaxLength(100) category!: string;

  // accepts 12, 12.5 or "12.50"; at most two decimals
  @Transform(({ value }: { value: unknown }) =>
    typeof value === "number" ? String(value) : value,
  )
  @IsString()
  @Matches(/^\d+(\.\d{1,2})?$/, {
    message: "price must be a non-negative amount with at most 2 decimals",
  })
  price!: string;
}
