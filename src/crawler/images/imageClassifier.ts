import { type AbsoluteUrl, stripQueryAndFragment } from '../url/absoluteUrl.js';

export const IMAGE_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.bmp'] as const;

const FALLBACK_FILENAME = 'image.bin';

export function isImage(url: AbsoluteUrl): boolean {
  const path = stripQueryAndFragment(url.path).toLowerCase();
  return IMAGE_EXTENSIONS.some((extension) => path.endsWith(extension));
}

/**
 * Local filename for an image URL. Distinct URLs can map to the same name
 * (`/a/x.png` and `/b/x.png`); the later download overwrites the earlier one.
 */
export function deriveFilename(url: AbsoluteUrl): string {
  const path = stripQueryAndFragment(url.path);
  const name = path.slice(path.lastIndexOf('/') + 1);
  return (name || FALLBACK_FILENAME).replace(/[^A-Za-z0-9._-]/g, '_');
}
