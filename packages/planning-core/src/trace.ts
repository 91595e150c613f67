import type { ExpansionRecord, ToolCallRecord } from './types';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * Append-only sink for one search run. Tool calls and expansions share a
 * single ordinal sequence so the two logs can be merged back into run order.
 */
export class TraceRecorder {
  private readonly toolCalls: ToolCallRecord[] = [];
  private readonly expansionLog: ExpansionRecord[] = [];
  private readonly byOrdinal = new Map<number, ToolCallRecord>();
  private nextOrdinal = 1;

  recordToolCall(entry: Omit<ToolCallRecord, 'ordinal'>): ToolCallRecord {
    const record = deepFreeze({ ordinal: this.nextOrdinal++, ...entry });
    this.toolCalls.push(record);
    this.byOrdinal.set(record.ordinal, record);
    return record;
  }

  recordExpansion(entry: Omit<ExpansionRecord, 'ordinal'>): ExpansionRecord {
    const record = deepFreeze({ ordinal: this.nextOrdinal++, ...entry });
    this.expansionLog.push(record);
    return record;
  }

  /** Ordinal the next appended record will receive. */
  get upcomingOrdinal(): number {
    return this.nextOrdinal;
  }

  toolCall(ordinal: number): ToolCallRecord | undefined {
    return this.byOrdinal.get(ordinal);
  }

  get records(): ToolCallRecord[] {
    return [...this.toolCalls];
  }

  get expansions(): ExpansionRecord[] {
    return [...this.expansionLog];
  }

  get toolCallCount(): number {
    return this.toolCalls.length;
  }
}
