import { errorCodeOf, errorMessageOf } from '@pdf-inspector/tools-core';
import type { ZodError } from 'zod';

export enum ToolErrorCode {
  InvalidArguments = 'InvalidArguments',
  NotAbsolutePath = 'NotAbsolutePath',
  NotFound = 'NotFound',
  NotAPdf = 'NotAPdf',
  NotADirectory = 'NotADirectory',
  PermissionDenied = 'PermissionDenied',
  ParseOrIOFailure = 'ParseOrIOFailure',
}

export interface ToolErrorInfo {
  code: ToolErrorCode;
  message: string;
}

/** Whether a path names a file or a directory, used to word messages. */
export type PathKind = 'file' | 'directory';

const PERMISSION_CODES = new Set(['EACCES', 'EPERM']);
const MISSING_CODES = new Set(['ENOENT', 'ENOTDIR']);

export function isPermissionError(e: unknown): boolean {
  const code = errorCodeOf(e);
  return code !== undefined && PERMISSION_CODES.has(code);
}

export function isMissingError(e: unknown): boolean {
  const code = errorCodeOf(e);
  return code !== undefined && MISSING_CODES.has(code);
}

export function notAbsolutePath(candidate: string, kind: PathKind): ToolErrorInfo {
  const subject = kind === 'file' ? 'File' : 'Directory';
  return {
    code: ToolErrorCode.NotAbsolutePath,
    message: `${subject} path must be absolute path, got: ${candidate}`,
  };
}

export function notFound(candidate: string, kind: PathKind): ToolErrorInfo {
  const subject = kind === 'file' ? 'File' : 'Directory';
  return { code: ToolErrorCode.NotFound, message: `${subject} not found: ${candidate}` };
}

export function notAPdf(candidate: string): ToolErrorInfo {
  return { code: ToolErrorCode.NotAPdf, message: `File must be a PDF: ${candidate}` };
}

export function notADirectory(candidate: string): ToolErrorInfo {
  return { code: ToolErrorCode.NotADirectory, message: `Path is not a directory: ${candidate}` };
}

export function permissionDenied(candidate: string, kind: PathKind, e: unknown): ToolErrorInfo {
  return {
    code: ToolErrorCode.PermissionDenied,
    message: `Permission denied accessing ${kind}: ${candidate}. Error: ${errorMessageOf(e)}`,
  };
}

export function invalidArguments(details: string): ToolErrorInfo {
  return { code: ToolErrorCode.InvalidArguments, message: `Input validation failed: ${details}` };
}

/** Formats a failed input parse as `field: message, message; field: message`. */
export function invalidArgumentsFrom(error: ZodError): ToolErrorInfo {
  const { formErrors, fieldErrors } = error.flatten();
  const details = [
    ...formErrors,
    ...Object.entries(fieldErrors).map(([field, messages]) => `${field}: ${(messages ?? []).join(', ')}`),
  ];
  return invalidArguments(details.join('; '));
}

/**
 * Classifies anything thrown after validation passed.
 * A path that disappeared since validation is reported as not found.
 *
 * @param failurePrefix Leads the message of the catch-all case, e.g. `Error reading PDF`.
 */
export function describeFailure(
  e: unknown,
  candidate: string,
  kind: PathKind,
  failurePrefix: string,
): ToolErrorInfo {
  if (isPermissionError(e)) {
    return permissionDenied(candidate, kind, e);
  }
  if (isMissingError(e)) {
    return notFound(candidate, kind);
  }
  return {
    code: ToolErrorCode.ParseOrIOFailure,
    message: `${failurePrefix}: ${errorMessageOf(e)}`,
  };
}
