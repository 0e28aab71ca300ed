import type { SelectItem } from 'searchable-select-shared';

export const apple: SelectItem<number> = { label: 'Apple', payload: 1 };
export const banana: SelectItem<number> = { label: 'Banana', payload: 2 };
export const avocado: SelectItem<number> = { label: 'Avocado', payload: 3 };

export const mango: SelectItem<number> = { label: 'Mango', payload: 4 };
export const orange: SelectItem<number> = { label: 'Orange', payload: 5 };
export const kiwi: SelectItem<number> = { label: 'Kiwi', payload: 6 };

export const fruits: readonly SelectItem<number>[] = [apple, banana, avocado];
export const moreFruits: readonly SelectItem<number>[] = [mango, orange, kiwi];

export function labels(items: readonly SelectItem<unknown>[]): string[] {
  return items.map((item) => item.label);
}
