import { existsSync, mkdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { MAX_SCREENSHOT_DIMENSION } from './constants.js';

/**
 * Shrinks a PNG to fit inside MAX_SCREENSHOT_DIMENSION on both sides.
 * Smaller images are returned untouched.
 */
export async function fitScreenshot(png: Buffer): Promise<Buffer> {
  const sharp = (await import('sharp')).default;
  const { width, height } = await sharp(png).metadata();

  if (width && height && (width > MAX_SCREENSHOT_DIMENSION || height > MAX_SCREENSHOT_DIMENSION)) {
    return sharp(png)
      .resize(MAX_SCREENSHOT_DIMENSION, MAX_SCREENSHOT_DIMENSION, {
        fit: 'inside',
        withoutEnlargement: true,
      })
      .png()
      .toBuffer();
  }

  return png;
}

/**
 * Writes a screenshot to `<directory>/<filename>`, creating the directory
 * if needed. Returns the path written.
 */
export async function saveScreenshot(png: Buffer, directory: string, filename: string): Promise<string> {
  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  const screenshotPath = join(directory, filename);
  writeFileSync(screenshotPath, await fitScreenshot(png));
  return screenshotPath;
}
