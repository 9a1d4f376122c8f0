import type { Request, Response } from "express";
import { toTodoResponse, type TodoListResponse, type TodoResponse } from "../../../core/dto/todoDto";
import type { Todo } from "../../../core/entities/todo";
import { NotFoundError } from "../../../core/errors";
import type { TodoService } from "../../../core/use-cases";
import {
  CreateTodoSchema,
  TodoQuerySchema,
  UpdateTodoSchema,
  parseOrThrow,
  parseTodoId,
} from "../validation/todoSchemas";

export type TodoControllerDeps = TodoService;

function toListResponse(list: TodoListResponse<Todo>): TodoListResponse<TodoResponse> {
  return { ...list, items: list.items.map(toTodoResponse) };
}

function notFound(id: number): NotFoundError {
  return new NotFoundError(`Todo with ID ${id} not found`);
}

export default function createTodoController(deps: TodoControllerDeps) {
  return {
    list: async (req: Request, res: Response) => {
      const filter = parseOrThrow(TodoQuerySchema, req.query);
      const list = await deps.listTodos(filter);
      return res.status(200).json(toListResponse(list));
    },

    listDeleted: async (req: Request, res: Response) => {
      const filter = parseOrThrow(TodoQuerySchema, req.query);
      const list = await deps.listDeletedTodos(filter);
      return res.status(200).json(toListResponse(list));
    },

    get: async (req: Request, res: Response) => {
      const id = parseTodoId(req.params.id);
      const item = await deps.getTodo(id);
      if (!item) throw notFound(id);
      return res.status(200).json(toTodoResponse(item));
    },

    create: async (req: Request, res: Response) => {
      const input = parseOrThrow(CreateTodoSchema, req.body);
      const created = await deps.createTodo(input);
      return res
        .status(201)
        .location(`${req.baseUrl}/todo/${created.id}`)
        .json(toTodoResponse(created));
    },

    update: async (req: Request, res: Response) => {
      const id = parseTodoId(req.params.id);
      const input = parseOrThrow(UpdateTodoSchema, req.body);
      const updated = await deps.updateTodo(id, input);
      if (!updated) throw notFound(id);
      return res.status(200).json(toTodoResponse(updated));
    },

    toggle: async (req: Request, res: Response) => {
      const id = parseTodoId(req.params.id);
      const toggled = await deps.toggleTodo(id);
      if (!toggled) throw notFound(id);
      return res.status(200).json(toTodoResponse(toggled));
    },

    remove: async (req: Request, res: Response) => {
      const id = parseTodoId(req.params.id);
      const ok = await deps.deleteTodo(id);
      if (!ok) throw notFound(id);
      return res.sendStatus(204);
    },

    restore: async (req: Request, res: Response) => {
      const id = parseTodoId(req.params.id);
      const restored = await deps.restoreTodo(id);
      if (!restored) throw notFound(id);
      return res.status(200).json(toTodoResponse(restored));
    },
  };
}
