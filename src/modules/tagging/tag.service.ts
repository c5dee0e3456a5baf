import { Injectable, Logger } from '@nestjs/common';
import { TagConfigService } from './tag-config.service';
import { TagContext } from './tag-context';
import { TaggedRepository } from './tagged-repository';

export interface PrefixContext {
  companyCode?: string | null;
  departmentName?: string | null;
}

export interface TagSettings {
  sequenceDigits: number;
  separator: string;
}

const FALLBACK_PREFIXES: Record<string, string> = {
  asset: 'ASSET',
  component: 'COMP',
};
const FALLBACK_PREFIX = 'TAG';
const FALLBACK_SETTINGS: TagSettings = { sequenceDigits: 5, separator: '' };

/** Existing tags inspected for the current highest sequence number. */
export const TAG_SCAN_LIMIT = 100;
/** Sequential candidates tried before falling back to a timestamp. */
export const TAG_CANDIDATE_LIMIT = 500;

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function sectionOf(value: unknown, key: string): Record<string, unknown> {
  if (!isRecord(value)) {
    return {};
  }
  const section = value[key];
  return isRecord(section) ? section : {};
}

function prefixIn(section: Record<string, unknown>, kind: string): string | undefined {
  const value = section[kind];
  return typeof value === 'string' ? value : undefined;
}

@Injectable()
export class TagService {
  private readonly logger = new Logger(TagService.name);

  constructor(private readonly tagConfig: TagConfigService) {}

  /**
   * Most specific configured prefix for `kind`: department, then company,
   * then defaults, then the built-in prefix. Department and company levels
   * need a company code.
   */
  resolvePrefix(kind: string, { companyCode, departmentName }: PrefixContext = {}): string {
    const config = this.tagConfig.load();

    let prefix = prefixIn(config.defaults ?? {}, kind) ?? FALLBACK_PREFIXES[kind] ?? FALLBACK_PREFIX;

    if (companyCode) {
      const company = sectionOf(config.companies, companyCode);
      prefix = prefixIn(company, kind) ?? prefix;

      if (departmentName) {
        const department = sectionOf(sectionOf(company, 'departments'), departmentName);
        prefix = prefixIn(department, kind) ?? prefix;
      }
    }

    return prefix;
  }

  getTagSettings(): TagSettings {
    const section = this.tagConfig.load().tag_settings;
    return {
      sequenceDigits: section?.sequence_digits ?? FALLBACK_SETTINGS.sequenceDigits,
      separator: section?.separator ?? FALLBACK_SETTINGS.separator,
    };
  }

  /**
   * Next free `prefix + separator + sequence` tag in `target`. Allocation is
   * not reserved: two concurrent callers may get the same tag, and the unique
   * constraint on the tag column rejects the second insert.
   */
  async generateTag(kind: string, target: TaggedRepository, context: PrefixContext = {}): Promise<string> {
    const prefix = this.resolvePrefix(kind, context);
    const { sequenceDigits, separator } = this.getTagSettings();
    const fullPrefix = `${prefix}${separator}`;

    const existing = await target.findTagsWithPrefix(fullPrefix, TAG_SCAN_LIMIT);
    let highest = 0;
    for (const tag of existing) {
      const suffix = tag.slice(fullPrefix.length);
      if (!/^\d+$/.test(suffix)) {
        continue;
      }
      highest = Math.max(highest, Number.parseInt(suffix, 10));
    }

    for (let step = 1; step <= TAG_CANDIDATE_LIMIT; step++) {
      const candidate = `${fullPrefix}${String(highest + step).padStart(sequenceDigits, '0')}`;
      if (!(await target.tagExists(candidate))) {
        return candidate;
      }
    }

    const fallback = `${fullPrefix}${Math.floor(Date.now() / 1000)}`;
    this.logger.warn(
      `Exhausted ${TAG_CANDIDATE_LIMIT} sequential candidates for prefix "${fullPrefix}"; using ${fallback}`,
    );
    return fallback;
  }

  generateAssetTag(target: TaggedRepository, context: TagContext = {}): Promise<string> {
    return this.generateTag('asset', target, this.toPrefixContext(context));
  }

  generateComponentTag(target: TaggedRepository, context: TagContext = {}): Promise<string> {
    return this.generateTag('component', target, this.toPrefixContext(context));
  }

  private toPrefixContext({ company, department }: TagContext): PrefixContext {
    return {
      companyCode: company?.code || null,
      departmentName: department?.name || null,
    };
  }
}
