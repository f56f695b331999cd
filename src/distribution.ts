import { SUPPORTED_DISTRIBUTIONS } from './constants';
import { UnsupportedValueError, UsageError } from './errors';
import { Distribution } from './types';

export function isSupportedDistribution(candidate: string): candidate is Distribution {
  return SUPPORTED_DISTRIBUTIONS.some((distribution) => distribution === candidate);
}

export function validateDistribution(candidate: string | undefined): Distribution {
  if (candidate === undefined || candidate.length === 0) {
    throw new UsageError('Distribution not specified. Use -d or --distro');
  }
  if (!isSupportedDistribution(candidate)) {
    throw new UnsupportedValueError(candidate);
  }
  return candidate;
}
