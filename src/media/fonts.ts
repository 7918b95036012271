import path from 'node:path';
import { access } from 'node:fs/promises';
import { PermanentJobError } from '../errors.js';

export const FONT_STYLE_NAMES = ['poppins', 'poetsenOne', 'alfaSlab', 'titanOne'] as const;

export type FontStyleName = (typeof FONT_STYLE_NAMES)[number];

export interface FontStyle {
  file: string;
  size: number;
}

export const FONT_STYLES: Record<FontStyleName, FontStyle> = {
  poppins: { file: 'Poppins-ExtraBold.ttf', size: 48 },
  poetsenOne: { file: 'PoetsenOne-Regular.ttf', size: 48 },
  alfaSlab: { file: 'AlfaSlabOne-Regular.ttf', size: 48 },
  titanOne: { file: 'TitanOne-Regular.ttf', size: 48 },
};

export interface ResolvedFont {
  path: string;
  size: number;
}

/** Absolute path and size for a style; a missing font file fails the job. */
export async function resolveFont(fontDir: string, style: FontStyleName): Promise<ResolvedFont> {
  const font = FONT_STYLES[style];
  const fontPath = path.resolve(fontDir, font.file);

  try {
    await access(fontPath);
  } catch (error) {
    throw new PermanentJobError('FONT_UNAVAILABLE', `Font file not found for style ${style}`, {
      step: 'overlay_text',
      cause: error,
    });
  }

  return { path: fontPath, size: font.size };
}
