const DEFAULT_STEM = 'converted';
const UNSAFE_FILENAME_CHARS = /[\u0000-\u001f\u007f"]/g;

/**
 * Download name for converted text: the uploaded file's base name with its
 * last extension replaced by `.txt`.
 */
export function toTextFilename(uploadedName: string | undefined): string {
  const base = (uploadedName ?? '').split(/[\\/]/).pop() ?? '';
  const stem = base
    .replace(/\.[^.]*$/, '')
    .replace(UNSAFE_FILENAME_CHARS, '')
    .trim();
  return `${stem || DEFAULT_STEM}.txt`;
}
