import { describe, expect, it } from "vitest";
import { describeRemaining, filterTodos, nextTodoId } from "./todoList.js";

const todos = [
  { id: 3, title: "Decoders chapter", completed: true },
  { id: 7, title: "Ports chapter", completed: false },
];

describe("nextTodoId", () => {
  it("starts at 1 for an empty list", () => {
    expect(nextTodoId([])).toBe(1);
  });

  it("goes one past the largest id", () => {
    expect(nextTodoId(todos)).toBe(8);
  });
});

describe("filterTodos", () => {
  it("splits active and completed items", () => {
    expect(filterTodos(todos, "active").map((t) => t.id)).toEqual([7]);
    expect(filterTodos(todos, "completed").map((t) => t.id)).toEqual([3]);
    expect(filterTodos(todos, "all").map((t) => t.id)).toEqual([3, 7]);
  });
});

describe("describeRemaining", () => {
  it("uses the singular for one item", () => {
    expect(describeRemaining(todos)).toBe("1 item left");
  });

  it("uses the plural otherwise", () => {
    expect(describeRemaining([])).toBe("0 items left");
  });
});
