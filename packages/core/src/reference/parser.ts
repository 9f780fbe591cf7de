// Image reference parsing
//
//   fedora:40                           → docker.io / fedora / fedora : 40 (official)
//   bitnami/redis:7.2                   → docker.io / bitnami / redis : 7.2
//   registry.redhat.io/ubi9/ubi:9.4     → registry.redhat.io / ubi9 / ubi : 9.4
//   myorg/team/app:v1                   → myorg / team / app : v1
//   localhost:5000/team/app@sha256:…    → localhost:5000 / team / app : latest (+digest)
//
// Never throws. Malformed input degrades to empty fields, which every
// evaluator treats as "unknown".

import { ADOPTION, REFERENCE } from '../constants.js';
import type { ImageReference } from '../types/index.js';

/** A leading segment names a registry host when it looks like one: "a.b", "host:port", "localhost". */
function isRegistryHost(segment: string): boolean {
  return segment.includes('.') || segment.includes(':') || segment === 'localhost';
}

/** Three or more segments always lead with a host; two only when the first looks like one. */
function hasRegistry(segments: readonly string[]): boolean {
  if (segments.length >= 3) return true;
  return segments.length === 2 && isRegistryHost(segments[0] ?? '');
}

const DOCKER_HUB_HOSTS: readonly string[] = ADOPTION.DOCKER_HUB.HOSTS;

export function parseImageReference(raw: string): ImageReference {
  let rest = raw.trim();

  let digest: string | undefined;
  const at = rest.indexOf('@');
  if (at >= 0) {
    digest = rest.slice(at + 1) || undefined;
    rest = rest.slice(0, at);
  }

  const segments = rest.split('/');
  let registry: string = REFERENCE.DEFAULT_REGISTRY;
  if (hasRegistry(segments)) {
    registry = segments.shift() || REFERENCE.DEFAULT_REGISTRY;
  }

  // Tag lives on the last path segment only, so "host:5000/app" keeps its port
  let tag = '';
  const last = segments.length - 1;
  const lastSegment = segments[last] ?? '';
  const colon = lastSegment.lastIndexOf(':');
  if (colon >= 0) {
    tag = lastSegment.slice(colon + 1);
    segments[last] = lastSegment.slice(0, colon);
  }

  let namespace: string;
  let repository: string;
  let official = false;
  if (segments.length <= 1) {
    // A bare name on Docker Hub is its own vendor namespace ("fedora" → fedora)
    repository = segments[0] ?? '';
    official = repository !== '' && DOCKER_HUB_HOSTS.includes(registry);
    namespace = official ? repository : '';
  } else {
    namespace = segments[0] ?? '';
    repository = segments.slice(1).join('/');
  }

  const ref: ImageReference = {
    registry,
    namespace,
    repository,
    tag: tag || REFERENCE.DEFAULT_TAG,
    ...(digest ? { digest } : {}),
    ...(official ? { official } : {}),
  };
  return Object.freeze(ref);
}

/** Docker Hub API path of an image: official images live under "library/" */
export function dockerHubPath(ref: ImageReference): string {
  return ref.official
    ? `${ADOPTION.DOCKER_HUB.OFFICIAL_NAMESPACE}/${ref.repository}`
    : `${ref.namespace}/${ref.repository}`;
}

/** Canonical form: registry/namespace/repository:tag[@digest] */
export function formatImageReference(ref: ImageReference): string {
  const path = ref.official || ref.namespace ? dockerHubPath(ref) : ref.repository;
  return `${ref.registry}/${path}:${ref.tag}${ref.digest ? `@${ref.digest}` : ''}`;
}
