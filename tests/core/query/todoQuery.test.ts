import { describe, it, expect } from "vitest";
import { Priority } from "../../../src/core/entities/todo";
import {
  compareTodos,
  matchesFilter,
  queryTodos,
  resolveSortKey,
  selectView,
} from "../../../src/core/query/todoQuery";
import { makeTodo, minutesAfterBase } from "../../helpers/fixtures";

const ids = (items: { id: number }[]) => items.map((t) => t.id);

describe("resolveSortKey", () => {
  it("matches keys case-insensitively and ignores surrounding spaces", () => {
    expect(resolveSortKey("Title")).toBe("title");
    expect(resolveSortKey(" DueDate ")).toBe("duedate");
    expect(resolveSortKey("ISCOMPLETED")).toBe("iscompleted");
  });

  it("falls back to createdat for absent, empty or unknown keys", () => {
    expect(resolveSortKey(undefined)).toBe("createdat");
    expect(resolveSortKey(null)).toBe("createdat");
    expect(resolveSortKey("")).toBe("createdat");
    expect(resolveSortKey("colour")).toBe("createdat");
  });
});

describe("selectView", () => {
  it("splits active and deleted items", () => {
    const items = [
      makeTodo({ id: 1 }),
      makeTodo({ id: 2, isDeleted: true, deletedAt: minutesAfterBase(10) }),
      makeTodo({ id: 3 }),
    ];
    expect(ids(selectView(items, "active"))).toEqual([1, 3]);
    expect(ids(selectView(items, "deleted"))).toEqual([2]);
  });
});

describe("matchesFilter", () => {
  const todo = makeTodo({ id: 1, isCompleted: true, priority: Priority.High });

  it("accepts everything when no predicate is set", () => {
    expect(matchesFilter(todo, {})).toBe(true);
  });

  it("requires every set predicate to hold", () => {
    expect(matchesFilter(todo, { isCompleted: true, priority: Priority.High })).toBe(true);
    expect(matchesFilter(todo, { isCompleted: false })).toBe(false);
    expect(matchesFilter(todo, { priority: Priority.Low })).toBe(false);
  });
});

describe("compareTodos", () => {
  it("orders titles by code unit, so uppercase sorts before lowercase", () => {
    const items = [
      makeTodo({ id: 1, title: "banana" }),
      makeTodo({ id: 2, title: "Cherry" }),
      makeTodo({ id: 3, title: "apple" }),
    ];
    items.sort(compareTodos("title", false));
    expect(items.map((t) => t.title)).toEqual(["Cherry", "apple", "banana"]);
  });

  it("keeps todos without a due date last in both directions", () => {
    const items = [
      makeTodo({ id: 1, dueDate: null }),
      makeTodo({ id: 2, dueDate: "2030-03-01T00:00:00.000Z" }),
      makeTodo({ id: 3, dueDate: "2030-02-01T00:00:00.000Z" }),
      makeTodo({ id: 4, dueDate: null }),
    ];
    expect(ids([...items].sort(compareTodos("duedate", false)))).toEqual([3, 2, 1, 4]);
    expect(ids([...items].sort(compareTodos("duedate", true)))).toEqual([2, 3, 4, 1]);
  });

  it("breaks ties by id in the sort direction", () => {
    const items = [
      makeTodo({ id: 2, priority: Priority.High }),
      makeTodo({ id: 1, priority: Priority.High }),
      makeTodo({ id: 3, priority: Priority.Low }),
    ];
    expect(ids([...items].sort(compareTodos("priority", false)))).toEqual([3, 1, 2]);
    expect(ids([...items].sort(compareTodos("priority", true)))).toEqual([2, 1, 3]);
  });

  it("puts completed items after open ones ascending", () => {
    const items = [
      makeTodo({ id: 1, isCompleted: true }),
      makeTodo({ id: 2, isCompleted: false }),
    ];
    expect(ids(items.sort(compareTodos("iscompleted", false)))).toEqual([2, 1]);
  });
});

describe("queryTodos", () => {
  const items = Array.from({ length: 15 }, (_, i) =>
    makeTodo({
      id: i + 1,
      isCompleted: i % 3 === 0,
      priority: i % 2 === 0 ? Priority.High : Priority.Low,
    })
  );

  it("defaults to newest first, page 1 of 10", () => {
    const result = queryTodos(items);
    expect(result.totalCount).toBe(15);
    expect(ids(result.items)).toEqual([15, 14, 13, 12, 11, 10, 9, 8, 7, 6]);
  });

  it("counts matches before paging", () => {
    const result = queryTodos(items, { isCompleted: true, pageSize: 2 });
    // completed: ids 1, 4, 7, 10, 13
    expect(result.totalCount).toBe(5);
    expect(ids(result.items)).toEqual([13, 10]);
  });

  it("combines predicates", () => {
    const result = queryTodos(items, { isCompleted: true, priority: Priority.High, sortDescending: false });
    // completed and high: ids 1, 7, 13
    expect(result.totalCount).toBe(3);
    expect(ids(result.items)).toEqual([1, 7, 13]);
  });

  it("returns the requested page ascending", () => {
    const result = queryTodos(items, { sortBy: "createdat", sortDescending: false, page: 2, pageSize: 5 });
    expect(result.totalCount).toBe(15);
    expect(ids(result.items)).toEqual([6, 7, 8, 9, 10]);
  });

  it("returns an empty page past the end but keeps the total", () => {
    const result = queryTodos(items, { page: 4, pageSize: 5 });
    expect(result.items).toEqual([]);
    expect(result.totalCount).toBe(15);
  });

  it("sorts by an unknown key as if by createdat", () => {
    const unknown = queryTodos(items, { sortBy: "whatever", sortDescending: false, pageSize: 3 });
    expect(ids(unknown.items)).toEqual([1, 2, 3]);
  });

  it("does not reorder its input", () => {
    const source = [makeTodo({ id: 1 }), makeTodo({ id: 2 })];
    queryTodos(source);
    expect(ids(source)).toEqual([1, 2]);
  });

  it("gives the same set when a filter is applied twice", () => {
    const filter = { isCompleted: false, priority: Priority.Low };
    const once = items.filter((t) => matchesFilter(t, filter));
    const twice = once.filter((t) => matchesFilter(t, filter));
    expect(ids(twice)).toEqual(ids(once));
  });

  it("reports the same total for every page size", () => {
    const totals = [1, 4, 7, 100].flatMap((pageSize) =>
      [1, 2, 3].map((page) => queryTodos(items, { priority: Priority.Low, page, pageSize }).totalCount)
    );
    expect(new Set(totals)).toEqual(new Set([7]));
  });

  it("covers every filtered item exactly once across all pages", () => {
    for (const sortBy of ["title", "duedate", "priority", "iscompleted", "createdat"]) {
      const pageSize = 4;
      const { totalCount } = queryTodos(items, { sortBy, pageSize });
      const pages = Array.from({ length: Math.ceil(totalCount / pageSize) }, (_, i) =>
        ids(queryTodos(items, { sortBy, page: i + 1, pageSize }).items)
      );
      const seen = pages.flat();
      expect(seen).toHaveLength(15);
      expect(new Set(seen).size).toBe(15);
    }
  });
});
