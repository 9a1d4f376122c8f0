export const Priority = {
  Low: 0,
  Medium: 1,
  High: 2,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export const PRIORITY_NAMES = ["Low", "Medium", "High"] as const;

export function isPriority(value: unknown): value is Priority {
  return value === Priority.Low || value === Priority.Medium || value === Priority.High;
}

/** Parses `2`, `"2"` or a case-insensitive name such as `"high"`; returns null otherwise. */
export function parsePriority(value: unknown): Priority | null {
  if (isPriority(value)) return value;
  if (typeof value !== "string") return null;
  const raw = value.trim();
  if (/^\d+$/.test(raw)) {
    const n = Number(raw);
    return isPriority(n) ? n : null;
  }
  const index = PRIORITY_NAMES.findIndex((name) => name.toLowerCase() === raw.toLowerCase());
  return index >= 0 && isPriority(index) ? index : null;
}

export interface Todo {
  id: number;
  title: string;
  description: string | null;
  isCompleted: boolean;
  createdAt: string; // ISO string
  dueDate: string | null; // ISO string
  priority: Priority;
  isDeleted: boolean;
  deletedAt: string | null; // ISO string, set iff isDeleted
}

/** Everything but the id, which the store assigns. */
export type TodoDraft = Omit<Todo, "id">;

export function createTodo(params: {
  title: string;
  description?: string | null;
  isCompleted?: boolean;
  createdAt?: string;
  dueDate?: string | null;
  priority?: Priority;
}): TodoDraft {
  return {
    title: params.title,
    description: params.description ?? null,
    isCompleted: !!params.isCompleted,
    createdAt: params.createdAt ?? new Date().toISOString(),
    dueDate: params.dueDate ?? null,
    priority: params.priority ?? Priority.Medium,
    isDeleted: false,
    deletedAt: null,
  };
}
