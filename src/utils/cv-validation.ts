import { DataValidationError } from './errors';
import { isRecord, type JsonObject } from './json';

const REQUIRED_TOP_LEVEL_FIELDS = ['personal_info', 'desired_role'];
const REQUIRED_PERSONAL_INFO_FIELDS = ['name', 'email'];

function isFilled(value: unknown): boolean {
  if (value === null || value === undefined || value === false) return false;
  if (typeof value === 'string') return value.trim() !== '';
  if (typeof value === 'number') return value !== 0;
  return true;
}

/**
 * Collect every schema violation in the CV document, then fail once with all
 * of them.
 */
export function validateCvData(cvData: JsonObject): void {
  const errors: string[] = [];

  for (const field of REQUIRED_TOP_LEVEL_FIELDS) {
    if (!(field in cvData)) errors.push(`Missing top-level field: '${field}'`);
  }

  const personalInfo = 'personal_info' in cvData ? cvData.personal_info : {};
  if (isRecord(personalInfo)) {
    for (const field of REQUIRED_PERSONAL_INFO_FIELDS) {
      if (!isFilled(personalInfo[field])) errors.push(`Missing required field: 'personal_info.${field}'`);
    }
  } else {
    errors.push("Field 'personal_info' must be an object");
  }

  const desiredRole = 'desired_role' in cvData ? cvData.desired_role : {};
  if (!isRecord(desiredRole)) errors.push("Field 'desired_role' must be an object");

  if (errors.length) {
    throw new DataValidationError(`Invalid CV data:\n- ${errors.join('\n- ')}`, errors);
  }
}
