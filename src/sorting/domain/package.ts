import { Centimeters, Kilograms, cm, kg } from './measures';

export interface Package {
  readonly width: Centimeters;
  readonly height: Centimeters;
  readonly length: Centimeters;
  readonly mass: Kilograms;
}

export interface PackageInput {
  width: number;
  height: number;
  length: number;
  mass: number;
}

export function createPackage(
  width: number,
  height: number,
  length: number,
  mass: number,
): Package {
  return Object.freeze({
    width: cm(width),
    height: cm(height),
    length: cm(length),
    mass: kg(mass),
  });
}

export function packageFrom(input: PackageInput): Package {
  return createPackage(input.width, input.height, input.length, input.mass);
}

// cubic centimeters
export function volumeOf(pkg: Package): number {
  return pkg.width * pkg.height * pkg.length;
}
