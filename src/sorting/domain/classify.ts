import { Category } from './category';
import { Package, createPackage, volumeOf } from './package';

export const BULKY_VOLUME_CM3 = 1_000_000;
export const BULKY_DIMENSION_CM = 150;
export const HEAVY_MASS_KG = 20;

export interface PackageAssessment {
  category: Category;
  bulky: boolean;
  heavy: boolean;
  volume: number;
}

/**
 * Bulky: volume of at least 1,000,000 cm³, or any single dimension of at
 * least 150 cm. Thresholds are inclusive.
 */
export function isBulky(pkg: Package): boolean {
  return (
    volumeOf(pkg) >= BULKY_VOLUME_CM3 ||
    pkg.width >= BULKY_DIMENSION_CM ||
    pkg.height >= BULKY_DIMENSION_CM ||
    pkg.length >= BULKY_DIMENSION_CM
  );
}

export function isHeavy(pkg: Package): boolean {
  return pkg.mass >= HEAVY_MASS_KG;
}

function categoryFor(bulky: boolean, heavy: boolean): Category {
  if (bulky && heavy) return Category.Rejected;
  if (bulky || heavy) return Category.Special;
  return Category.Standard;
}

export function assessPackage(pkg: Package): PackageAssessment {
  const bulky = isBulky(pkg);
  const heavy = isHeavy(pkg);
  return {
    category: categoryFor(bulky, heavy),
    bulky,
    heavy,
    volume: volumeOf(pkg),
  };
}

export function classifyPackage(pkg: Package): Category {
  return categoryFor(isBulky(pkg), isHeavy(pkg));
}

/**
 * Sorts a package into STANDARD, SPECIAL or REJECTED from its dimensions
 * (cm) and mass (kg).
 *
 * Total over every double: NaN never satisfies a threshold on its own, so a
 * NaN dimension or mass only matters through the other inputs.
 */
export function classify(
  width: number,
  height: number,
  length: number,
  mass: number,
): Category {
  return classifyPackage(createPackage(width, height, length, mass));
}
