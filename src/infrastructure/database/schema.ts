import { sqliteTable, text, integer, index } from "drizzle-orm/sqlite-core";
import { Priority } from "../../core/entities/todo";

export const todoItems = sqliteTable("todo_items", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  title: text("title").notNull(),
  description: text("description"),
  isCompleted: integer("is_completed", { mode: "boolean" }).notNull().default(false),
  /** ISO-8601, written once on insert */
  createdAt: text("created_at").notNull(),
  dueDate: text("due_date"),
  priority: integer("priority").$type<Priority>().notNull().default(Priority.Medium),
  isDeleted: integer("is_deleted", { mode: "boolean" }).notNull().default(false),
  deletedAt: text("deleted_at"),
}, (table) => [
  index("idx_todo_items_is_deleted").on(table.isDeleted),
  index("idx_todo_items_is_completed").on(table.isCompleted),
  index("idx_todo_items_priority").on(table.priority),
  index("idx_todo_items_created_at").on(table.createdAt),
  index("idx_todo_items_due_date").on(table.dueDate),
]);

export type TodoRow = typeof todoItems.$inferSelect;
