import { Logger, silentLogger } from '../observability/logger';
import { toBytes } from './sizeParser';

export type LimitSource = 'platform' | 'application';

/**
 * Ceilings from one source. Sizes accept "80M"-style strings or byte counts.
 */
export interface LimitCeilings {
  maxTotalSize: string | number;
  maxFileSize: string | number;
  maxFiles: number;
}

/**
 * Wire shape served by the upload-limits endpoint.
 */
export interface UploadLimits {
  max_total_size: number;
  max_file_size: number;
  max_files: number;
  max_total_size_formatted: string;
  max_file_size_formatted: string;
  size_margin?: number;
}

export interface NegotiatedLimits extends UploadLimits {
  binding: {
    max_total_size: LimitSource;
    max_file_size: LimitSource;
    max_files: LimitSource;
  };
}

const SIZE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'] as const;

/**
 * Format a byte count in the largest unit whose quotient is at least 1,
 * rounded to two decimals ("1 MB", "1.5 KB", "0 B").
 */
export function formatSize(bytes: number): string {
  let value = Math.max(bytes, 0);
  let unit = 0;

  while (value >= 1024 && unit < SIZE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  const rounded = Math.round(value * 100) / 100;
  return `${rounded} ${SIZE_UNITS[unit]}`;
}

/**
 * Merges platform-imposed ceilings with application-declared ones and
 * returns the most restrictive value per dimension.
 */
export class UploadLimitsNegotiator {
  constructor(
    private readonly platform: LimitCeilings,
    private readonly application: LimitCeilings,
    private readonly logger: Logger = silentLogger,
    private readonly sizeMargin?: number,
  ) {}

  getEffectiveLimits(): NegotiatedLimits {
    const platformTotal = toBytes(this.platform.maxTotalSize);
    const platformFile = toBytes(this.platform.maxFileSize);
    const platformFiles = Math.floor(this.platform.maxFiles);

    const appTotal = toBytes(this.application.maxTotalSize);
    const appFile = toBytes(this.application.maxFileSize);
    const appFiles = Math.floor(this.application.maxFiles);

    this.logger.debug('Raw upload limits', {
      platform: { post_max_size: platformTotal, upload_max_filesize: platformFile, max_file_uploads: platformFiles },
      application: { max_total_size: appTotal, max_file_size: appFile, max_files: appFiles },
    });

    const total = this.pick('max_total_size', platformTotal, appTotal);
    const file = this.pick('max_file_size', platformFile, appFile);
    const files = this.pick('max_files', platformFiles, appFiles);

    const limits: NegotiatedLimits = {
      max_total_size: total.value,
      max_file_size: file.value,
      max_files: files.value,
      max_total_size_formatted: formatSize(total.value),
      max_file_size_formatted: formatSize(file.value),
      binding: {
        max_total_size: total.source,
        max_file_size: file.source,
        max_files: files.source,
      },
    };

    if (this.sizeMargin !== undefined) {
      limits.size_margin = this.sizeMargin;
    }

    this.logger.info('Effective upload limits', {
      max_total_size: limits.max_total_size,
      max_file_size: limits.max_file_size,
      max_files: limits.max_files,
    });

    return limits;
  }

  private pick(
    name: keyof NegotiatedLimits['binding'],
    platformValue: number,
    appValue: number,
  ): { value: number; source: LimitSource } {
    if (platformValue < appValue) {
      // Platform undercuts the application setting; operators may want to raise it.
      this.logger.warning('Platform upload limit is more restrictive than application limit', {
        limit_name: name,
        platform_value: platformValue,
        application_value: appValue,
      });
      return { value: platformValue, source: 'platform' };
    }
    return { value: appValue, source: 'application' };
  }
}
