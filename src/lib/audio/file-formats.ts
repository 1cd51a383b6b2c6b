import * as path from 'path';
import { InputFormat, OutputFormat } from '@/types/audio';
import { DEFAULT_OUTPUT_FORMAT, SUPPORTED_INPUT_FORMATS, SUPPORTED_OUTPUT_FORMATS } from '@/lib/config';

/**
 * Lower-cased extension without the dot, or '' when the path has none.
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

export function isInputFormat(ext: string): ext is InputFormat {
  return SUPPORTED_INPUT_FORMATS.some((format) => format === ext);
}

export function isOutputFormat(ext: string): ext is OutputFormat {
  return SUPPORTED_OUTPUT_FORMATS.some((format) => format === ext);
}

/**
 * Give an extensionless save path the default output extension.
 */
export function withDefaultExtension(filePath: string): string {
  return getExtension(filePath) === '' ? `${filePath}.${DEFAULT_OUTPUT_FORMAT}` : filePath;
}
