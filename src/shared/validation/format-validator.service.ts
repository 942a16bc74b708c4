import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as path from 'path';
import type { AppConfig } from '../../config/configuration';

/**
 * Lower-cased extension of a filename including the dot (`clip.MP4` -> `.mp4`),
 * or an empty string when there is none. Directory parts are ignored.
 */
export function extractExtension(fileName: string): string {
  const baseName = path.posix.basename(fileName.replace(/\\/g, '/'));
  return path.posix.extname(baseName).toLowerCase();
}

export function isAcceptedFormat(fileName: string, acceptedFormats: ReadonlySet<string>): boolean {
  const extension = extractExtension(fileName);
  return extension.length > 0 && acceptedFormats.has(extension);
}

/**
 * Format Validator
 * Accepts a filename when its extension is in the configured allow-list.
 */
@Injectable()
export class FormatValidatorService {
  private readonly acceptedFormats: ReadonlySet<string>;

  constructor(private readonly configService: ConfigService<AppConfig, true>) {
    this.acceptedFormats = new Set(
      this.configService
        .get('files', { infer: true })
        .supportedFormats.map((format) => format.toLowerCase()),
    );
  }

  isSupported(fileName: string): boolean {
    return isAcceptedFormat(fileName, this.acceptedFormats);
  }

  getAcceptedFormats(): string[] {
    return Array.from(this.acceptedFormats);
  }
}
