/**
 * Checksum policy: which algorithms each region guarantees, and validation
 * of a locally computed set against the server's.
 */

import { createHash } from 'crypto';
import { PCLOUD_HOSTS, PCloudRegion, regionForHost } from '../config';
import { ChecksumMismatch, ConfigurationError, IntegrityError } from '../errors';

export type ChecksumAlgorithm = 'md5' | 'sha1' | 'sha256';

export const CHECKSUM_ALGORITHMS: readonly ChecksumAlgorithm[] = ['md5', 'sha1', 'sha256'];

/**
 * Hex digests keyed by algorithm
 */
export type ChecksumSet = Partial<Record<ChecksumAlgorithm, string>>;

/**
 * Algorithms guaranteed in `checksumfile` responses, per region
 */
export const REGION_CHECKSUM_ALGORITHMS: Readonly<Record<PCloudRegion, readonly ChecksumAlgorithm[]>> = {
  international: ['md5', 'sha1'],
  european: ['sha1', 'sha256'],
};

export function checksumAlgorithmsForRegion(region: PCloudRegion): readonly ChecksumAlgorithm[] {
  return REGION_CHECKSUM_ALGORITHMS[region];
}

/**
 * Algorithms guaranteed by a host. Hosts outside the documented pair need an explicit region.
 */
export function checksumAlgorithmsForHost(host: string, region?: PCloudRegion): readonly ChecksumAlgorithm[] {
  const resolved = region ?? regionForHost(host);
  if (!resolved) {
    throw new ConfigurationError(
      `No checksum policy for host ${host}; expected ${PCLOUD_HOSTS.international} or ${PCLOUD_HOSTS.european}, or an explicit region`
    );
  }
  return checksumAlgorithmsForRegion(resolved);
}

/**
 * Compute digests of local content
 */
export function computeChecksums(
  data: string | Uint8Array,
  algorithms: readonly ChecksumAlgorithm[] = CHECKSUM_ALGORITHMS
): ChecksumSet {
  const result: ChecksumSet = {};
  for (const algorithm of algorithms) {
    result[algorithm] = createHash(algorithm).update(data).digest('hex');
  }
  return result;
}

function normalize(digest: string): string {
  return digest.trim().toLowerCase();
}

/**
 * Compare the algorithms both sets carry. Any disagreement fails, and so does
 * a pair of sets with no algorithm in common.
 */
export function validateChecksum(expected: ChecksumSet, computed: ChecksumSet): void {
  const mismatches: ChecksumMismatch[] = [];
  let compared = 0;

  for (const algorithm of CHECKSUM_ALGORITHMS) {
    const want = expected[algorithm];
    const got = computed[algorithm];
    if (want === undefined || got === undefined) continue;
    compared += 1;
    if (normalize(want) !== normalize(got)) {
      mismatches.push({ algorithm, expected: want, computed: got });
    }
  }

  if (mismatches.length > 0) {
    const names = mismatches.map((m) => m.algorithm).join(', ');
    throw new IntegrityError(`checksum mismatch for ${names}`, mismatches);
  }
  if (compared === 0) {
    throw new IntegrityError('no checksum algorithm in common');
  }
}
