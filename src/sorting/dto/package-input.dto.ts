import { IsNumber, Min, isNumberString, validateSync } from 'class-validator';
import { Transform, plainToInstance } from 'class-transformer';
import { InputViolation } from '../errors/sorting-errors';
import { PackageInput } from '../domain/package';

// decimal strings (argv, env) become numbers; anything else, blanks and hex
// included, becomes NaN
const toNumber = ({ value }: { value: unknown }): number => {
  if (typeof value === 'number') return value;
  return typeof value === 'string' && isNumberString(value)
    ? Number(value)
    : NaN;
};

export class PackageInputDto implements PackageInput {
  @Transform(toNumber) @IsNumber() @Min(0) width!: number;
  @Transform(toNumber) @IsNumber() @Min(0) height!: number;
  @Transform(toNumber) @IsNumber() @Min(0) length!: number;
  @Transform(toNumber) @IsNumber() @Min(0) mass!: number;
}

export function toPackageInput(raw: Record<string, unknown>): PackageInputDto {
  return plainToInstance(PackageInputDto, raw);
}

export function validatePackageInput(dto: PackageInputDto): InputViolation[] {
  return validateSync(dto).map((e) => ({
    field: e.property,
    value: e.value,
    constraints: Object.values(e.constraints ?? {}),
  }));
}
