import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';
import { existsSync, readFileSync, statSync } from 'fs';
import { TagPrefixDocument } from './tag-config.schema';

export interface LoadOptions {
  forceReload?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Reads the tag prefix document and caches it until the file's mtime
 * changes, so edits apply without a restart. A missing or broken file reads
 * as an empty document.
 */
@Injectable()
export class TagConfigService {
  private readonly logger = new Logger(TagConfigService.name);
  private cache: TagPrefixDocument | null = null;
  private cachedMtime = 0;

  constructor(private readonly configService: ConfigService) {}

  get configPath(): string {
    return this.configService.get<string>('tagging.configPath') ?? 'tag-prefixes.json';
  }

  load({ forceReload = false }: LoadOptions = {}): TagPrefixDocument {
    const path = this.configPath;

    if (!existsSync(path)) {
      this.logger.debug(`Tag prefix config not found at ${path}; using built-in prefixes`);
      return this.remember(new TagPrefixDocument(), 0);
    }

    const mtime = this.mtimeOf(path);
    if (this.cache && !forceReload && mtime === this.cachedMtime) {
      return this.cache;
    }

    try {
      const document = this.parse(readFileSync(path, 'utf-8'));
      this.logger.log(`Loaded tag prefix config from ${path}`);
      return this.remember(document, mtime);
    } catch (error) {
      this.logger.warn(
        `Ignoring tag prefix config at ${path}: ${error instanceof Error ? error.message : String(error)}`,
      );
      return this.remember(new TagPrefixDocument(), 0);
    }
  }

  clearCache(): void {
    this.cache = null;
    this.cachedMtime = 0;
  }

  private parse(content: string): TagPrefixDocument {
    const raw: unknown = JSON.parse(content);
    if (!isRecord(raw)) {
      throw new Error('expected a JSON object');
    }

    const document = plainToInstance(TagPrefixDocument, raw);
    const errors = validateSync(document);
    if (errors.length > 0) {
      throw new Error(errors.toString());
    }
    return document;
  }

  private mtimeOf(path: string): number {
    try {
      return statSync(path).mtimeMs;
    } catch (error) {
      this.logger.debug(`Could not stat ${path}: ${error instanceof Error ? error.message : String(error)}`);
      return 0;
    }
  }

  private remember(document: TagPrefixDocument, mtime: number): TagPrefixDocument {
    this.cache = document;
    this.cachedMtime = mtime;
    return document;
  }
}
