/**
 * Known extensions per image MIME type, preferred one first
 */
const IMAGE_EXTENSIONS: Record<string, string[]> = {
  "image/jpeg": [".jpg", ".jpeg", ".jpe"],
  "image/pjpeg": [".jpg", ".jpeg"],
  "image/png": [".png"],
  "image/gif": [".gif"],
  "image/webp": [".webp"],
  "image/avif": [".avif"],
  "image/bmp": [".bmp"],
  "image/tiff": [".tiff", ".tif"],
  "image/svg+xml": [".svg"],
  "image/x-icon": [".ico"],
  "image/vnd.microsoft.icon": [".ico"],
  "image/heic": [".heic"],
};

/**
 * Known extensions for a Content-Type header value, ignoring parameters
 *
 * @example
 * extensionsFor("image/jpeg; charset=binary") // [".jpg", ".jpeg", ".jpe"]
 */
export function extensionsFor(contentType: string | null): string[] {
  if (!contentType) return [];
  const mime = contentType.split(";")[0].trim().toLowerCase();
  return IMAGE_EXTENSIONS[mime] ?? [];
}

/**
 * Append the extension implied by the Content-Type, unless the filename already ends in one of its extensions
 */
export function repairExtension(
  filename: string,
  contentType: string | null,
): string {
  const extensions = extensionsFor(contentType);
  if (extensions.length === 0) return filename;

  const lower = filename.toLowerCase();
  if (extensions.some((ext) => lower.endsWith(ext))) {
    return filename;
  }
  return `${filename}${extensions[0]}`;
}
