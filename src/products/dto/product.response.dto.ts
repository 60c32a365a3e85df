import { ApiProperty } from "@nestjs/swagger";
import { Expose } from "class-transformer";

export class ProductResponseDto {
  @ApiProperty() @Expose() _id!: string;
  @ApiProperty() @Expose() name!: string;
  @ApiProperty() @Expose() category!: string;
  @ApiProperty({ example: "78.60" }) @Expose() price!: string;
}

export class ReindexResponseDto {
  @ApiProperty() @Expose() indexed!: number;
}
