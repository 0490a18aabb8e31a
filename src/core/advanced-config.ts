import fs from 'fs-extra';
import { z } from 'zod';
import { Logger } from '../utils/logger';
import { FileSystemError } from './errors';

export type ConfigItemType = 'bool' | 'int' | 'enum';

export interface AdvancedConfigItem {
  name: string;
  type: ConfigItemType;
  min?: number;
  max?: number;
  defaultValue: string;
  enumValues: string[];
  description: string;
}

export type DefineCheck =
  | { ok: true; warning?: string }
  | { ok: false; error: string };

/**
 * Value of a C integer literal (decimal, hex or octal, optional sign and
 * u/l suffixes), or null when the text is not one.
 */
export function parseIntegerLiteral(text: string): number | null {
  const match = /^([-+]?)(0[xX][0-9a-fA-F]+|0[0-7]*|[1-9][0-9]*)[uUlL]*$/.exec(text.trim());
  if (!match) {
    return null;
  }

  const [, sign, digits] = match;
  let magnitude: number;
  if (/^0[xX]/.test(digits)) {
    magnitude = parseInt(digits.slice(2), 16);
  } else if (digits.length > 1 && digits.startsWith('0')) {
    magnitude = parseInt(digits.slice(1), 8);
  } else {
    magnitude = parseInt(digits, 10);
  }

  return sign === '-' ? -magnitude : magnitude;
}

const optionalNumber = z
  .string()
  .trim()
  .transform((value, ctx) => {
    if (value === '') {
      return undefined;
    }
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: ${value}` });
      return z.NEVER;
    }
    return parsed;
  });

const rowSchema = z.object({
  name: z.string().trim().min(1),
  type: z
    .string()
    .trim()
    .transform(value => (value === '' ? 'int' : value))
    .pipe(z.enum(['bool', 'int', 'enum'])),
  min: optionalNumber.default(''),
  max: optionalNumber.default(''),
  default: z.string().trim().default(''),
  enumvalues: z.string().trim().default(''),
  description: z.string().trim().default('')
});

/**
 * Advanced build-time settings (PICO_CONFIG entries) read from a
 * tab-separated file. The settings only ever become preprocessor defines.
 */
export class AdvancedConfigCatalog {
  private readonly byName: ReadonlyMap<string, AdvancedConfigItem>;

  constructor(readonly items: readonly AdvancedConfigItem[]) {
    this.byName = new Map(items.map(item => [item.name, item]));
  }

  static empty(): AdvancedConfigCatalog {
    return new AdvancedConfigCatalog([]);
  }

  /**
   * Load the TSV file. A missing file gives an empty catalog.
   */
  static async load(tsvPath: string): Promise<AdvancedConfigCatalog> {
    if (!(await fs.pathExists(tsvPath))) {
      Logger.warning(`No Pico configurations file found at ${tsvPath}. Continuing without`);
      return AdvancedConfigCatalog.empty();
    }

    let content: string;
    try {
      content = await fs.readFile(tsvPath, 'utf-8');
    } catch (error) {
      throw new FileSystemError(`Failed to read configuration file ${tsvPath}`, tsvPath, error);
    }

    return AdvancedConfigCatalog.parse(content);
  }

  /**
   * Parse TSV text with a header row. Rows that fail validation are skipped
   * with a warning.
   */
  static parse(content: string): AdvancedConfigCatalog {
    const lines = content.split(/\r?\n/).filter(line => line.trim().length > 0);
    if (lines.length === 0) {
      return AdvancedConfigCatalog.empty();
    }

    const header = lines[0].split('\t').map(column => column.trim());
    const items: AdvancedConfigItem[] = [];

    lines.slice(1).forEach((line, index) => {
      const cells = line.split('\t');
      const row: Record<string, string> = {};
      header.forEach((column, i) => {
        row[column] = cells[i] ?? '';
      });

      const parsed = rowSchema.safeParse(row);
      if (!parsed.success) {
        Logger.warning(`Skipping configuration row ${index + 2}: ${parsed.error.issues[0].message}`);
        return;
      }

      const data = parsed.data;
      items.push({
        name: data.name,
        type: data.type,
        min: data.min,
        max: data.max,
        defaultValue: data.default,
        enumValues: data.enumvalues === '' ? [] : data.enumvalues.split('|'),
        description: data.description
      });
    });

    return new AdvancedConfigCatalog(items);
  }

  get size(): number {
    return this.items.length;
  }

  get(name: string): AdvancedConfigItem | undefined {
    return this.byName.get(name);
  }

  /**
   * Check a value against an item's type and limits. Names the table does
   * not know, and int values that are not plain integer literals (a symbol,
   * an expression), are passed through with a warning.
   */
  validate(name: string, value: string): DefineCheck {
    const item = this.byName.get(name);
    if (!item) {
      return { ok: true, warning: `${name} is not a known configuration item; passing it through unchecked` };
    }

    switch (item.type) {
      case 'bool':
        return value === 'True' || value === 'False'
          ? { ok: true }
          : { ok: false, error: `${name} is a boolean; use True or False` };

      case 'int': {
        if (value.trim() === '') {
          return { ok: false, error: `${name} needs a value` };
        }
        const parsed = parseIntegerLiteral(value);
        if (parsed === null) {
          return { ok: true, warning: `${name}=${value} is not an integer literal; passing it through unchecked` };
        }
        if (item.min !== undefined && parsed < item.min) {
          return { ok: false, error: `${name} must be at least ${item.min}` };
        }
        if (item.max !== undefined && parsed > item.max) {
          return { ok: false, error: `${name} must be at most ${item.max}` };
        }
        return { ok: true };
      }

      case 'enum':
        return item.enumValues.includes(value)
          ? { ok: true }
          : { ok: false, error: `${name} must be one of: ${item.enumValues.join(', ')}` };
    }
  }
}
