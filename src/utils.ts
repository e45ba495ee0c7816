import path from "node:path";

export const SUPPORTED_EXTENSIONS = ["jpg", "jpeg", "png", "webp", "gif"];

export function isImageFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase().slice(1);
  return SUPPORTED_EXTENSIONS.includes(ext);
}

export function toKilobytes(bytes: number): number {
  return Math.floor(bytes / 1024);
}

export function percentSaved(original: number, saved: number): number {
  return original > 0 ? (saved / original) * 100 : 0;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
