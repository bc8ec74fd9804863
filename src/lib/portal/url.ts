import { PORTAL_ROOT_SEGMENT } from "../constants";

/**
 * Resolve a Location header against the URL that produced it. Handles
 * absolute, root-relative and path-relative values.
 */
export function resolveLocation(currentUrl: string, location: string): string {
  return new URL(location.trim(), currentUrl).toString();
}

/**
 * The portal sometimes redirects to a path with its root segment doubled
 * ("/AptusPortal/AptusPortal/..."); collapse it to one.
 */
export function normalizePortalUrl(url: string, rootSegment: string = PORTAL_ROOT_SEGMENT): string {
  const escaped = rootSegment.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
  const doubled = new RegExp(`/(${escaped})/${escaped}(?=/|$|\\?)`, "gi");
  return url.replace(doubled, "/$1");
}

export function portalUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, "")}${path}`;
}
