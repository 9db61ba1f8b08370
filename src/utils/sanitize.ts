const UNSAFE_FILENAME_CHARS = /[<>:"/\\|?*]/g;

export function sanitizeFileName(title: string): string {
  return title.replace(UNSAFE_FILENAME_CHARS, ' ');
}
