export function round2(value: number): number {
     return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function round4(value: number): number {
     return Math.round((value + Number.EPSILON) * 10000) / 10000;
}

// pg returns NUMERIC and BIGINT columns as strings
export function toNumber(value: string | number | null | undefined): number {
     if (value === null || value === undefined) {
          return 0;
     }
     return typeof value === 'number' ? value : Number(value);
}

export function toNullableNumber(value: string | number | null | undefined): number | null {
     return value === null || value === undefined ? null : toNumber(value);
}
