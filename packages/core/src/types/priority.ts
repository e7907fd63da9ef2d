export const Priority = {
  Low: 1,
  Medium: 2,
  High: 3,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PriorityName: Record<Priority, string> = {
  [Priority.Low]: 'Low',
  [Priority.Medium]: 'Medium',
  [Priority.High]: 'High',
};

export const PRIORITIES: readonly Priority[] = [Priority.Low, Priority.Medium, Priority.High];

export function isPriority(value: unknown): value is Priority {
  return value === Priority.Low || value === Priority.Medium || value === Priority.High;
}

/** Coerce arbitrary input to a Priority; anything outside 1..3 falls back to Low */
export function normalizePriority(value: unknown): Priority {
  if (isPriority(value)) return value;
  if (typeof value === 'string' && /^\s*[123]\s*$/.test(value)) {
    const parsed = Number(value);
    if (isPriority(parsed)) return parsed;
  }
  return Priority.Low;
}
