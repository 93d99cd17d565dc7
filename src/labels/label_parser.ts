/**
 * @fileoverview Label normalizer
 *
 * Maps `prefix:value`, `prefix-value` and scoped `prefix::value` labels onto
 * fixed columns. Labels that match no pattern but still look like
 * `category:value` fill up to three custom slots.
 */

import type { FinalNode } from '../hierarchy/types.js';
import { logDebug, logInfo } from '../telemetry/logger.js';

export const LABEL_COLUMNS = ['priority', 'type', 'status', 'team', 'component'] as const;

export type LabelColumn = (typeof LABEL_COLUMNS)[number];

export interface LabelPattern {
  readonly prefix: string;
  readonly column: LabelColumn;
}

export const DEFAULT_LABEL_PATTERNS: readonly LabelPattern[] = LABEL_COLUMNS.map((column) => ({
  prefix: column,
  column,
}));

export const CUSTOM_SLOT_COUNT = 3;

export interface ParsedLabels {
  priority: string | null;
  type: string | null;
  status: string | null;
  team: string | null;
  component: string | null;
  /** `category:value`, in label order. At most CUSTOM_SLOT_COUNT entries. */
  custom: string[];
}

export type LabeledNode = FinalNode & { readonly labelColumns: ParsedLabels };

const CUSTOM_CATEGORY = /^([a-zA-Z0-9_]+)(?:::|:|-)(.+)$/;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function compile(prefix: string): RegExp {
  return new RegExp(`^${escapeRegExp(prefix)}(?:::|:|-)(.+)$`, 'i');
}

export function emptyLabels(): ParsedLabels {
  return { priority: null, type: null, status: null, team: null, component: null, custom: [] };
}

export class LabelParser {
  private readonly patterns: Array<LabelPattern & { readonly matcher: RegExp }>;
  private readonly discovered = new Set<string>();

  constructor(patterns: readonly LabelPattern[] = DEFAULT_LABEL_PATTERNS) {
    this.patterns = patterns.map((pattern) => ({ ...pattern, matcher: compile(pattern.prefix) }));
  }

  /**
   * First matching pattern wins, both across patterns for one label and
   * across labels for one column.
   */
  parse(labels: readonly string[]): ParsedLabels {
    const parsed = emptyLabels();
    for (const label of labels) {
      const pattern = this.patterns.find((candidate) => candidate.matcher.test(label));
      if (pattern) {
        const value = pattern.matcher.exec(label)?.[1]?.trim() ?? '';
        if (parsed[pattern.column] === null && value !== '') {
          parsed[pattern.column] = value;
        }
        continue;
      }
      this.collectCustom(label, parsed);
    }
    return parsed;
  }

  parseNodes(nodes: readonly FinalNode[]): LabeledNode[] {
    logInfo(`Parsing labels for ${nodes.length} item(s)`);
    const labeled = nodes.map((node) => ({ ...node, labelColumns: this.parse(node.labels) }));
    if (this.discovered.size > 0) {
      logInfo(`Discovered ${this.discovered.size} custom label categories`, {
        categories: this.getDiscoveredCategories(),
      });
    }
    return labeled;
  }

  getDiscoveredCategories(): string[] {
    return [...this.discovered].sort();
  }

  addPattern(prefix: string, column: LabelColumn): void {
    this.patterns.push({ prefix, column, matcher: compile(prefix) });
    logDebug(`Added label pattern: ${prefix} -> ${column}`);
  }

  private collectCustom(label: string, parsed: ParsedLabels): void {
    const match = CUSTOM_CATEGORY.exec(label);
    if (!match) return;
    const category = match[1].toLowerCase();
    const value = match[2].trim();
    if (!this.discovered.has(category)) {
      this.discovered.add(category);
      logDebug(`Discovered custom label category: ${category}`);
    }
    if (parsed.custom.length < CUSTOM_SLOT_COUNT) {
      parsed.custom.push(`${category}:${value}`);
    }
  }
}
