import { z } from "zod";

// Largest value of a 128-bit decimal.
export const DECIMAL_MAX = Number("79228162514264337593543950335");
export const PRICE_MIN = 0.01;

export const PRICE_RANGE_MESSAGE =
  "Price must be between 0.01 and 79228162514264337593543950335";

export interface Product {
  id: number;
  name: string;
  price: number;
}

const nameSchema = z
  .string({
    required_error: "Name is required",
    invalid_type_error: "Name must be a string",
  })
  .trim()
  .min(1, "Name is required");

const priceSchema = z
  .number({
    required_error: "Price is required",
    invalid_type_error: "Price must be a number",
  })
  .min(PRICE_MIN, PRICE_RANGE_MESSAGE)
  .max(DECIMAL_MAX, PRICE_RANGE_MESSAGE);

export const createProductSchema = z.object({
  name: nameSchema,
  price: priceSchema,
});

export const updateProductSchema = z.object({
  id: z
    .number({
      required_error: "Id is required",
      invalid_type_error: "Id must be a number",
    })
    .int("Id must be an integer"),
  name: nameSchema,
  price: priceSchema,
});

export type CreateProductRequest = z.infer<typeof createProductSchema>;

export type UpdateProductRequest = z.infer<typeof updateProductSchema>;
