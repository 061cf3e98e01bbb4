import * as Joi from 'joi';
import { PackageInput } from '../domain/package';
import samplePackages from './sample-packages.data.json';

export interface SamplePackage extends PackageInput {
  description: string;
}

const samplePackageSchema = Joi.array()
  .items(
    Joi.object<SamplePackage>({
      description: Joi.string().required(),
      width: Joi.number().required(),
      height: Joi.number().required(),
      length: Joi.number().required(),
      mass: Joi.number().required(),
    }),
  )
  .min(1);

export function loadSamplePackages(
  raw: unknown = samplePackages,
): SamplePackage[] {
  const { value, error } = samplePackageSchema.validate(raw, {
    convert: false,
  });
  if (error) {
    throw new Error(`Malformed sample package list: ${error.message}`);
  }
  return value;
}
