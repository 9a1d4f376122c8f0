import { Priority, type Todo } from "../../src/core/entities/todo";
import type { UseCaseDeps } from "../../src/core/use-cases";

export const BASE_TIME = Date.parse("2030-01-01T00:00:00.000Z");

export function minutesAfterBase(minutes: number): string {
  return new Date(BASE_TIME + minutes * 60_000).toISOString();
}

export function makeTodo(overrides: Partial<Todo> & Pick<Todo, "id">): Todo {
  return {
    title: `Todo ${overrides.id}`,
    description: null,
    isCompleted: false,
    createdAt: minutesAfterBase(overrides.id),
    dueDate: null,
    priority: Priority.Medium,
    isDeleted: false,
    deletedAt: null,
    ...overrides,
  };
}

export interface RecordedLog {
  context: object;
  message: string;
}

/** Clock that advances one minute per call, plus a logger that records entries. */
export function makeTestDeps(start = BASE_TIME): UseCaseDeps & { logs: RecordedLog[] } {
  let tick = 0;
  const logs: RecordedLog[] = [];
  return {
    clock: () => new Date(start + tick++ * 60_000),
    logger: { info: (context, message) => logs.push({ context, message }) },
    logs,
  };
}
