import { Client } from 'basic-ftp';

import { createChildLogger } from '../utils/logger.js';

const logger = createChildLogger({ service: 'publisher' });

export interface FtpSettings {
  host?: string;
  port: number;
  user?: string;
  password?: string;
  targetDir?: string;
  /** Explicit TLS (AUTH TLS) */
  secure: boolean;
  timeoutMs: number;
}

export type PublishResult = { ok: true; message: string } | { ok: false; message: string };

/**
 * Publisher - copies a final image to the public FTP server
 */
export class Publisher {
  constructor(private readonly settings: FtpSettings) {}

  /**
   * Names of the required settings that are not configured
   */
  missingSettings(): string[] {
    const required: Array<[string, string | undefined]> = [
      ['FTP_HOST', this.settings.host],
      ['FTP_USER', this.settings.user],
      ['FTP_PASS', this.settings.password],
      ['FTP_TARGET_DIR', this.settings.targetDir],
    ];
    return required.filter(([, value]) => !value).map(([name]) => name);
  }

  async publish(localPath: string, remoteName: string): Promise<PublishResult> {
    const { host, port, user, password, targetDir, secure, timeoutMs } = this.settings;
    if (!host || !user || !password || !targetDir) {
      const missing = this.missingSettings();
      const message = `FTP is not configured: missing ${missing.join(', ')}`;
      logger.warn({ missing }, message);
      return { ok: false, message };
    }

    const client = new Client(timeoutMs);

    try {
      await client.access({ host, port, user, password, secure });
      await client.cd(targetDir);
      await client.uploadFrom(localPath, remoteName);
      await this.quit(client);

      const message = `Uploaded ${remoteName} to ${host}:${targetDir}`;
      logger.info({ host, targetDir, remoteName }, 'Final image published');
      return { ok: true, message };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ host, targetDir, remoteName, error: message }, 'FTP upload failed');
      return { ok: false, message };
    } finally {
      client.close();
    }
  }

  /**
   * End the session with QUIT; the upload already succeeded, so a refusal is only logged
   */
  private async quit(client: Client): Promise<void> {
    try {
      await client.send('QUIT');
    } catch (error) {
      logger.warn({ error: error instanceof Error ? error.message : String(error) }, 'FTP server did not acknowledge QUIT');
    }
  }
}
