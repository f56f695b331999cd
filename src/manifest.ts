import { MANIFEST_BASE_URL, MANIFEST_FILE } from './constants';
import { ManifestUnreachableError } from './errors';
import { ConfirmedManifest, Distribution, ResolvedManifestReference } from './types';

export type HeadRequest = (url: string) => Promise<{ status: number }>;

export type ManifestProbe = (url: string) => Promise<boolean>;

const SAFE_RELEASE_TAG = /^[A-Za-z0-9._/-]+$/;

export function resolveManifestUrl(
  distribution: Distribution,
  releaseTag?: string,
  baseUrl: string = MANIFEST_BASE_URL
): ResolvedManifestReference {
  const ref = releaseTag ? `${distribution}-${releaseTag}` : distribution;
  return { url: `${baseUrl}/${ref}/${MANIFEST_FILE}`, confirmed: false };
}

/**
 * The tag is pasted into the URL path as-is. This reports tags that could
 * change the URL beyond a single ref (query, fragment, dot segments).
 */
export function isPathSafeReleaseTag(releaseTag: string): boolean {
  return SAFE_RELEASE_TAG.test(releaseTag) && !releaseTag.split('/').includes('..');
}

export const fetchHead: HeadRequest = async (url) => {
  const response = await fetch(url, { method: 'HEAD' });
  return { status: response.status };
};

export function createManifestProbe(head: HeadRequest = fetchHead): ManifestProbe {
  return async (url) => {
    try {
      const { status } = await head(url);
      return status === 200;
    } catch {
      return false;
    }
  };
}

export async function confirmManifest(
  reference: ResolvedManifestReference,
  probe: ManifestProbe
): Promise<ConfirmedManifest> {
  if (!(await probe(reference.url))) {
    throw new ManifestUnreachableError(reference.url);
  }
  return { url: reference.url, confirmed: true };
}
