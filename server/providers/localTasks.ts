import type { TodoStatus } from "@shared/schema";
import type { IStorage } from "../storage";
import type { LocalTaskProvider } from "./types";

/**
 * The todo list kept in the application's own database. Always available,
 * so it is the last resort for task creation.
 */
export function createLocalTaskProvider(storage: IStorage): LocalTaskProvider {
  return {
    create: (text: string, due: Date | null) =>
      storage.createTodo({ text, dueAt: due, status: "open" }),
    list: (status?: TodoStatus) => storage.listTodos(status),
  };
}
