// Rough per-slot costs for V8 arrays, maps and small objects.
export const BYTES_PER_ARRAY_SLOT = 8;
export const BYTES_PER_MAP_ENTRY = 40;
export const BYTES_PER_OBJECT_HEADER = 24;
export const BYTES_PER_STRING_CHAR = 2;

export interface MemUsageEntry {
  label: string;
  usedBytes: number;
  reservedBytes: number;
}

/** Collects approximate memory use of IR structures, for profiling only. */
export class MemUsage {
  private readonly entries: MemUsageEntry[] = [];

  add(label: string, usedBytes: number, reservedBytes = usedBytes): void {
    this.entries.push({ label, usedBytes, reservedBytes });
  }

  /** Adds an array whose slots are small fixed-size records. */
  addArray(label: string, length: number, bytesPerElement: number): void {
    const used = length * (bytesPerElement + BYTES_PER_ARRAY_SLOT);
    // Array backing stores grow geometrically.
    const capacity = length === 0 ? 0 : 2 ** Math.ceil(Math.log2(length));
    const reserved = capacity * (bytesPerElement + BYTES_PER_ARRAY_SLOT);
    this.add(label, used, reserved);
  }

  static concatLabel(prefix: string, label: string): string {
    return prefix ? `${prefix}.${label}` : label;
  }

  get totalUsedBytes(): number {
    return this.entries.reduce((sum, entry) => sum + entry.usedBytes, 0);
  }

  get totalReservedBytes(): number {
    return this.entries.reduce((sum, entry) => sum + entry.reservedBytes, 0);
  }

  toJSON(): readonly MemUsageEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  format(): string {
    const lines = this.entries.map(
      (entry) => `${entry.label}: ${entry.usedBytes} used, ${entry.reservedBytes} reserved`
    );
    lines.push(
      `total: ${this.totalUsedBytes} used, ${this.totalReservedBytes} reserved`
    );
    return lines.join("\n");
  }
}
