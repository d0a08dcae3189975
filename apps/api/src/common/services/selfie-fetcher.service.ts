import { BadRequestException, Inject, Injectable, Logger } from '@nestjs/common';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { extname, join } from 'path';

import { APP_CONFIG, AppConfig, SelfieConfig } from '../../config/app.config';
import { ERROR_CODES, SELFIE } from '@shared/constants';
import { getErrorMessage } from '@shared/utils';

@Injectable()
export class SelfieFetcherService {
  private readonly logger = new Logger(SelfieFetcherService.name);
  private readonly config: SelfieConfig;

  constructor(@Inject(APP_CONFIG) appConfig: AppConfig) {
    this.config = appConfig.selfie;
  }

  /**
   * Downloads the selfie into a private temp directory, hands the file path to
   * `use` and removes the directory afterwards, whatever `use` does.
   */
  async withDownloadedSelfie<T>(selfieUrl: string, use: (filePath: string) => Promise<T>): Promise<T> {
    if (!URL.canParse(selfieUrl)) {
      throw new BadRequestException({
        code: ERROR_CODES.SELFIE_DOWNLOAD_FAILED,
        message: 'Selfie URL is not a valid URL',
      });
    }

    const bytes = await this.download(selfieUrl);
    const directory = await mkdtemp(join(tmpdir(), SELFIE.TEMP_DIR_PREFIX));

    try {
      const extension = extname(new URL(selfieUrl).pathname) || SELFIE.DEFAULT_EXTENSION;
      const filePath = join(directory, `selfie${extension}`);
      await writeFile(filePath, bytes);
      return await use(filePath);
    } finally {
      try {
        await rm(directory, { recursive: true, force: true });
      } catch (cleanupError) {
        this.logger.warn(`Failed to remove temporary selfie directory ${directory}: ${getErrorMessage(cleanupError)}`);
      }
    }
  }

  private async download(selfieUrl: string): Promise<Buffer> {
    let response: Response;
    try {
      response = await fetch(selfieUrl, {
        signal: AbortSignal.timeout(this.config.downloadTimeoutMs),
      });
    } catch (error) {
      throw new BadRequestException({
        code: ERROR_CODES.SELFIE_DOWNLOAD_FAILED,
        message: `Failed to download selfie: ${getErrorMessage(error)}`,
      });
    }

    if (!response.ok) {
      throw new BadRequestException({
        code: ERROR_CODES.SELFIE_DOWNLOAD_FAILED,
        message: `Failed to download selfie: origin returned ${response.status}`,
      });
    }

    const bytes = Buffer.from(await response.arrayBuffer());
    this.logger.debug(`Downloaded selfie (${bytes.length} bytes)`);
    return bytes;
  }
}
