export const COLUMN_KEYS = ['timestamp', 'location', 'items', 'note', 'revenue'] as const;

export type ColumnKey = (typeof COLUMN_KEYS)[number];

export type ColumnLabels = Record<ColumnKey, string>;

export interface ColumnLayout {
  preset: ColumnPreset;
  // Physical order of columns A..E; the sheet header must follow it
  order: readonly ColumnKey[];
  labels: ColumnLabels;
}

interface PresetDefinition {
  order: readonly ColumnKey[];
  labels: ColumnLabels;
}

export const COLUMN_PRESETS = {
  en: {
    order: COLUMN_KEYS,
    labels: {
      timestamp: 'timestamp',
      location: 'location',
      items: 'items',
      note: 'note',
      revenue: 'revenue'
    }
  },
  bg: {
    order: COLUMN_KEYS,
    labels: {
      timestamp: 'Дата',
      location: 'Обект',
      items: 'Продукти',
      note: 'Бележка',
      revenue: 'Оборот'
    }
  },
  // Header of the first sheet version: quantity sits before note
  legacy: {
    order: ['timestamp', 'location', 'items', 'revenue', 'note'],
    labels: {
      timestamp: 'timestamp',
      location: 'location',
      items: 'product',
      note: 'note',
      revenue: 'quantity'
    }
  }
} as const satisfies Record<string, PresetDefinition>;

export type ColumnPreset = keyof typeof COLUMN_PRESETS;

export const isColumnPreset = (value: string): value is ColumnPreset =>
  Object.prototype.hasOwnProperty.call(COLUMN_PRESETS, value);

export const resolveColumnLayout = (preset: ColumnPreset): ColumnLayout => ({
  preset,
  order: [...COLUMN_PRESETS[preset].order],
  labels: { ...COLUMN_PRESETS[preset].labels }
});

export const headerLabels = (layout: ColumnLayout): string[] => layout.order.map((key) => layout.labels[key]);

// 1 -> A, 5 -> E, 27 -> AA
export const columnLetter = (position: number): string => {
  let remaining = position;
  let letters = '';
  while (remaining > 0) {
    const offset = (remaining - 1) % 26;
    letters = String.fromCharCode(65 + offset) + letters;
    remaining = Math.floor((remaining - 1) / 26);
  }
  return letters;
};
