import type { ImageCandidate, PageImages } from "../types";

/**
 * Interleave per-page image lists round-robin into one candidate list
 *
 * Takes the i-th image of every page (in page order) before any (i+1)-th image,
 * so each page contributes early; pages with more images fill the tail.
 *
 * ```
 * p0: [a]         =>  (p0,a) (p2,x) (p3,m)
 * p1: []                     (p2,y) (p3,n)
 * p2: [x, y, z]              (p2,z)
 * p3: [m, n]
 * ```
 */
export function mix(pages: readonly PageImages[]): ImageCandidate[] {
  if (pages.length === 0) {
    return [];
  }

  if (pages.length === 1) {
    const [{ pageUrl, imageUrls }] = pages;
    return imageUrls.map((imageUrl) => ({ pageUrl, imageUrl }));
  }

  const longest = Math.max(...pages.map((page) => page.imageUrls.length));
  const candidates: ImageCandidate[] = [];

  for (let i = 0; i < longest; i++) {
    for (const { pageUrl, imageUrls } of pages) {
      if (i < imageUrls.length) {
        candidates.push({ pageUrl, imageUrl: imageUrls[i] });
      }
    }
  }

  return candidates;
}
