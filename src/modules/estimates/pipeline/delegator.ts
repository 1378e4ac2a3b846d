import type { CategorizedItem, Category, DelegatedItem } from '../interfaces';
import { UNASSIGNED } from '../interfaces';

export function delegateItems(
  items: readonly CategorizedItem[],
  assignments: ReadonlyMap<Category, string>,
): DelegatedItem[] {
  return items.map((item) =>
    Object.freeze({ ...item, assignedTo: assignments.get(item.category) ?? UNASSIGNED }),
  );
}
