import { PositionId } from '../domain/PositionId';

export function compareIds(idA: string, idB: string): number {
  const a = tryParse(idA);
  const b = tryParse(idB);
  if (!a || !b) {
    // Unparseable ids sort as plain strings
    return idA.localeCompare(idB);
  }
  return a.compareTo(b);
}

function tryParse(id: string): PositionId | undefined {
  try {
    return PositionId.parse(id);
  } catch {
    return undefined;
  }
}

export function sortById<T extends { id: string }>(items: T[]): T[] {
  return [...items].sort((a, b) => compareIds(a.id, b.id));
}
