import { isRecord } from '../guards';

export type UploadType = 'egi' | 'epp' | 'utility' | 'default';

export const UPLOAD_TYPES: ReadonlyArray<UploadType> = ['egi', 'epp', 'utility', 'default'];

export const isUploadType = (value: unknown): value is UploadType => UPLOAD_TYPES.some((type) => type === value);

/**
 * Application-side upload policy, from `config/upload-manager.json`.
 */
export interface UploadPolicy {
  maxTotalSize: string | number;
  maxFileSize: string | number;
  maxFiles: number;
  sizeMargin: number;
  /** Per-file ceiling used by the client validator, in bytes. */
  maxSize: number;
  availableLangs: string[];
  allowedExtensions: string[];
  allowedMimeTypes: string[];
  /** Page path to the upload type it serves. */
  uploadTypePaths: Record<string, UploadType>;
  uploadEndpoints: Record<UploadType, string>;
  defaultUploadType: UploadType;
}

const stringArray = (value: unknown): string[] | null =>
  Array.isArray(value) && value.every((item) => typeof item === 'string') ? value : null;

const sizeValue = (value: unknown): string | number | null =>
  typeof value === 'string' || typeof value === 'number' ? value : null;

/**
 * @throws Error naming the first invalid field
 */
export function parseUploadPolicy(raw: unknown): UploadPolicy {
  if (!isRecord(raw)) {
    throw new Error('Upload policy must be a JSON object');
  }

  const fail = (field: string): never => {
    throw new Error(`Invalid upload policy field: ${field}`);
  };

  const maxTotalSize = sizeValue(raw.maxTotalSize) ?? fail('maxTotalSize');
  const maxFileSize = sizeValue(raw.maxFileSize) ?? fail('maxFileSize');
  const maxFiles = typeof raw.maxFiles === 'number' ? raw.maxFiles : fail('maxFiles');
  const sizeMargin = raw.sizeMargin === undefined ? 1.1 : typeof raw.sizeMargin === 'number' ? raw.sizeMargin : fail('sizeMargin');
  const maxSize = typeof raw.maxSize === 'number' ? raw.maxSize : fail('maxSize');
  const availableLangs = stringArray(raw.availableLangs ?? ['en']) ?? fail('availableLangs');
  const allowedExtensions = stringArray(raw.allowedExtensions) ?? fail('allowedExtensions');
  const allowedMimeTypes = stringArray(raw.allowedMimeTypes) ?? fail('allowedMimeTypes');
  const defaultUploadType = isUploadType(raw.defaultUploadType) ? raw.defaultUploadType : fail('defaultUploadType');

  const uploadTypePaths: Record<string, UploadType> = {};
  if (!isRecord(raw.uploadTypePaths)) {
    fail('uploadTypePaths');
  } else {
    for (const [path, type] of Object.entries(raw.uploadTypePaths)) {
      uploadTypePaths[path] = isUploadType(type) ? type : fail(`uploadTypePaths.${path}`);
    }
  }

  const endpoints = isRecord(raw.uploadEndpoints) ? raw.uploadEndpoints : fail('uploadEndpoints');
  const endpointFor = (type: UploadType): string => {
    const value = endpoints[type];
    return typeof value === 'string' ? value : fail(`uploadEndpoints.${type}`);
  };

  return {
    maxTotalSize,
    maxFileSize,
    maxFiles,
    sizeMargin,
    maxSize,
    availableLangs,
    allowedExtensions: allowedExtensions.map((extension) => extension.toLowerCase()),
    allowedMimeTypes,
    uploadTypePaths,
    uploadEndpoints: {
      egi: endpointFor('egi'),
      epp: endpointFor('epp'),
      utility: endpointFor('utility'),
      default: endpointFor('default'),
    },
    defaultUploadType,
  };
}
