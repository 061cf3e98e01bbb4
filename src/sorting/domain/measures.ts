declare const unit: unique symbol;

type Measure<U extends string> = number & { readonly [unit]: U };

export type Centimeters = Measure<'cm'>;
export type Kilograms = Measure<'kg'>;

// no validation or rounding: NaN, infinities and negatives pass through unchanged
export function cm(value: number): Centimeters {
  return value as Centimeters;
}

export function kg(value: number): Kilograms {
  return value as Kilograms;
}
