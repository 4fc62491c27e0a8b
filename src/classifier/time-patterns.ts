/**
 * Exact type name to time semantics
 */
export interface TimePattern {
  readonly exactTypeName: string;
  readonly isOrderable: boolean;
}

export const DEFAULT_TIME_PATTERNS: readonly TimePattern[] = [
  { exactTypeName: 'Date', isOrderable: true },
  { exactTypeName: 'Temporal.Instant', isOrderable: true },
  { exactTypeName: 'Temporal.PlainDate', isOrderable: true },
  { exactTypeName: 'Temporal.PlainDateTime', isOrderable: true },
  { exactTypeName: 'Temporal.PlainTime', isOrderable: true },
  { exactTypeName: 'Temporal.ZonedDateTime', isOrderable: true },
  { exactTypeName: 'luxon.DateTime', isOrderable: true },
  { exactTypeName: 'dayjs.Dayjs', isOrderable: true },
  { exactTypeName: 'moment.Moment', isOrderable: true },
];

/**
 * Ordered, immutable table of time patterns
 * Built once per generation run and passed to every classification call
 */
export class TimePatternTable {
  private readonly patterns: readonly TimePattern[];

  private constructor(patterns: readonly TimePattern[]) {
    this.patterns = Object.freeze([...patterns]);
  }

  static empty(): TimePatternTable {
    return new TimePatternTable([]);
  }

  static withDefaults(): TimePatternTable {
    return new TimePatternTable(DEFAULT_TIME_PATTERNS);
  }

  /**
   * Returns a new table with the additions appended
   * An addition whose exact name is already present is ignored
   */
  extend(additions: readonly TimePattern[]): TimePatternTable {
    const merged = [...this.patterns];
    for (const addition of additions) {
      if (!merged.some(pattern => pattern.exactTypeName === addition.exactTypeName)) {
        merged.push({ exactTypeName: addition.exactTypeName, isOrderable: addition.isOrderable });
      }
    }
    return new TimePatternTable(merged);
  }

  /**
   * First pattern whose name equals typeName exactly
   */
  match(typeName: string): TimePattern | undefined {
    return this.patterns.find(pattern => pattern.exactTypeName === typeName);
  }

  entries(): readonly TimePattern[] {
    return this.patterns;
  }
}
