import { Prop, Schema, SchemaFactory } from "@nestjs/mongoose";
import mongoose, { Document, Types } from "mongoose";

export type ProductDocument = Product & Document;

@Schema({ timestamps: true })
export class Product {
  @Prop({ required: true }) name!: string;

  @Prop({ required: true, index: true }) category!: string;

  // exact decimal, never a JS number
  @Prop({ type: mongoose.Schema.Types.Decimal128, required: true })
  price!: Types.Decimal128;
}

export const ProductSchema = SchemaFactory.createForClass(Product);
