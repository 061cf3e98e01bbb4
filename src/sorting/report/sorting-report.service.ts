import { Injectable } from '@nestjs/common';
import { Category, categoryLabel } from '../domain/category';
import { PackageInput } from '../domain/package';
import { toPackageInput } from '../dto/package-input.dto';
import { SortingError } from '../errors/sorting-errors';
import { PackageSorterService } from '../services/package-sorter.service';
import { SamplePackage, loadSamplePackages } from './sample-packages';

export const REPORT_TITLE = 'Package Sorting System';

export function formatLine(
  description: string,
  pkg: PackageInput,
  category: Category,
): string {
  return (
    `${description}: ${pkg.width}x${pkg.height}x${pkg.length} cm, ` +
    `${pkg.mass} kg -> ${categoryLabel(category)}`
  );
}

@Injectable()
export class SortingReportService {
  private samples?: SamplePackage[];

  constructor(private readonly sorter: PackageSorterService) {}

  sampleReport(): string[] {
    this.samples ??= loadSamplePackages();
    return [
      REPORT_TITLE,
      '',
      ...this.samples.map((s) => this.describe(s.description, s)),
    ];
  }

  /**
   * No arguments prints the sample report; `width height length mass`
   * classifies a single package.
   */
  run(argv: string[]): string[] {
    if (argv.length === 0) {
      return this.sampleReport();
    }

    if (argv.length !== 4) {
      throw new SortingError(
        'INVALID_ARGUMENTS',
        'Usage: package-sorter [<width> <height> <length> <mass>]',
        { received: argv },
      );
    }

    const [width, height, length, mass] = argv;
    const input = toPackageInput({ width, height, length, mass });
    return [this.describe('Package', input)];
  }

  private describe(description: string, pkg: PackageInput): string {
    const { category } = this.sorter.sort(pkg);
    return formatLine(description, pkg, category);
  }
}
