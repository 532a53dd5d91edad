import * as Joi from 'joi';
import { readJsonFile } from './file.utils';
import { RecorderStatus } from '../types/status.types';

export const recorderStatusSchema = Joi.object<RecorderStatus>({
  status: Joi.string().required(),
  message: Joi.string().allow('').default(''),
  timestamp: Joi.string().optional(),
})
  .unknown(true)
  .required();

/** Returns null for anything that isn't a status record. */
export function parseRecorderStatus(raw: unknown): RecorderStatus | null {
  const result = recorderStatusSchema.validate(raw);
  if (result.error) return null;
  return result.value;
}

/**
 * Missing, unreadable, corrupt and mis-shaped status files all read as null.
 */
export function readStatusFile(filePath: string): RecorderStatus | null {
  return parseRecorderStatus(readJsonFile(filePath));
}
