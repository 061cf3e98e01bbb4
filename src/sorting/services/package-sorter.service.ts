import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { PackageAssessment, assessPackage } from '../domain/classify';
import { PackageInput, packageFrom } from '../domain/package';
import {
  toPackageInput,
  validatePackageInput,
} from '../dto/package-input.dto';
import { SortingError } from '../errors/sorting-errors';

@Injectable()
export class PackageSorterService {
  private readonly logger = new Logger(PackageSorterService.name);
  readonly validationEnabled: boolean;

  constructor(config: ConfigService) {
    // Joi converts the env string, but a raw 'true' may still come through
    const flag = config.get<boolean | string>('SORTING_VALIDATE_INPUT', false);
    this.validationEnabled = flag === true || flag === 'true';
  }

  sort(input: PackageInput): PackageAssessment {
    if (this.validationEnabled) {
      this.assertValid(input);
    }

    const assessment = assessPackage(packageFrom(input));
    this.logger.debug(
      `${input.width}x${input.height}x${input.length} cm, ${input.mass} kg: ` +
        `bulky=${assessment.bulky} heavy=${assessment.heavy} -> ${assessment.category}`,
    );
    return assessment;
  }

  private assertValid(input: PackageInput): void {
    const violations = validatePackageInput(toPackageInput({ ...input }));
    if (violations.length > 0) {
      throw new SortingError(
        'INVALID_INPUT',
        `Invalid package: ${violations.map((v) => v.field).join(', ')}`,
        { violations },
      );
    }
  }
}
