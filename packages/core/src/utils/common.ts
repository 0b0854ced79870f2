import fs from 'fs';
import path from 'path';

/**
 * Safely extracts an error message from an unknown error value.
 * Handles Error objects, objects with message property, and converts other types to strings.
 *
 * @param error - The error value (unknown type from catch clause).
 * @returns A string representation of the error message.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Reads the numeric `code` of an error-like value, if it carries one.
 *
 * @param error - The error value (unknown type from catch clause).
 * @returns The code, or undefined when absent or not a number.
 */
export function getErrorCode(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

/**
 * Narrows an unknown value to a plain (non-array) object.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Ensures a directory exists, creating parent directories as needed.
 *
 * @param dirPath - Directory path, resolved against the current working directory.
 * @returns The absolute directory path.
 */
export async function ensureDirectory(dirPath: string): Promise<string> {
  const absolutePath = path.resolve(process.cwd(), dirPath);
  await fs.promises.mkdir(absolutePath, { recursive: true });
  return absolutePath;
}

/**
 * Recursively freezes an object graph in place and returns it.
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
