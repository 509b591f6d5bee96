import { join } from 'node:path';
import type { FragmentSource, ImageReference, TableFragment, TextFragment } from './types';

const OCR_PAGE_PREFIX = 'Page ';
const OCR_MARKER = ' (OCR): ';

function parsePositiveInteger(raw: string): number | null {
  return /^\d+$/.test(raw) ? Number.parseInt(raw, 10) : null;
}

/**
 * PDF capabilities prefix OCR'd page text with `Page N (OCR): `. Those fragments are re-tagged as
 * `ocr` with the page recovered; anything that does not parse stays a plain `text` fragment.
 */
export function tagPdfText(text: string): TextFragment {
  if (text.startsWith(OCR_PAGE_PREFIX)) {
    const markerIndex = text.indexOf(OCR_MARKER);
    if (markerIndex >= 0) {
      const pageNumber = parsePositiveInteger(text.slice(OCR_PAGE_PREFIX.length, markerIndex));
      if (pageNumber !== null) {
        return {
          text: text.slice(markerIndex + OCR_MARKER.length),
          source: 'ocr',
          pageNumber,
        };
      }
    }
  }

  return { text, source: 'text', pageNumber: null };
}

export function tagTables(tablesHtml: string[], source: FragmentSource): TableFragment[] {
  return tablesHtml.map((html) => ({ html, source, pageNumber: null }));
}

/** `page_3.png` → page 3. Returns null for files that are not page renders at all. */
export function tagPdfPageImage(fileName: string, imagesDir: string): ImageReference | null {
  if (!fileName.startsWith('page_') || !fileName.endsWith('.png')) {
    return null;
  }

  const rawNumber = fileName.slice('page_'.length, -'.png'.length);
  return {
    path: join(imagesDir, fileName),
    source: 'page',
    pageNumber: parsePositiveInteger(rawNumber),
  };
}

/** `slide3_img2.png` → slide 3. Returns null for files that are not slide images. */
export function tagSlideImage(fileName: string, imagesDir: string): ImageReference | null {
  if (!fileName.startsWith('slide') || !fileName.includes('_img')) {
    return null;
  }

  const slidePart = fileName.split('_')[0] ?? '';
  return {
    path: join(imagesDir, fileName),
    source: 'slide',
    pageNumber: parsePositiveInteger(slidePart.slice('slide'.length)),
  };
}

export function sortImageReferences(images: ImageReference[]): ImageReference[] {
  return [...images].sort((left, right) => {
    const leftPage = left.pageNumber ?? Number.POSITIVE_INFINITY;
    const rightPage = right.pageNumber ?? Number.POSITIVE_INFINITY;
    if (leftPage !== rightPage) {
      return leftPage < rightPage ? -1 : 1;
    }
    return left.path.localeCompare(right.path, 'en', { numeric: true });
  });
}
