import { createSelector, createSlice, type PayloadAction } from "@reduxjs/toolkit";
import {
  filterTodos,
  nextTodoId,
  type Todo,
  type TodoFilter,
} from "@study-archive/shared";

export type TodoListState = {
  items: Todo[];
  draft: string;
  filter: TodoFilter;
  nextId: number;
  /** False until the reader changes the list or a saved list is restored */
  touched: boolean;
};

export const initialTodoListState: TodoListState = {
  items: [],
  draft: "",
  filter: "all",
  nextId: 1,
  touched: false,
};

const todosSlice = createSlice({
  name: "todos",
  initialState: initialTodoListState,
  reducers: {
    draftChanged(state, action: PayloadAction<string>) {
      state.draft = action.payload;
    },

    todoAdded(state) {
      const title = state.draft.trim();
      if (title === "") return;

      state.items.push({ id: state.nextId, title, completed: false });
      state.nextId += 1;
      state.draft = "";
      state.touched = true;
    },

    todoToggled(state, action: PayloadAction<number>) {
      const todo = state.items.find((item) => item.id === action.payload);
      if (todo) {
        todo.completed = !todo.completed;
        state.touched = true;
      }
    },

    todoRemoved(state, action: PayloadAction<number>) {
      state.items = state.items.filter((item) => item.id !== action.payload);
      state.touched = true;
    },

    completedCleared(state) {
      state.items = state.items.filter((item) => !item.completed);
      state.touched = true;
    },

    filterChanged(state, action: PayloadAction<TodoFilter>) {
      state.filter = action.payload;
    },

    /** A saved list from localStorage replaces whatever is there. */
    todosReplaced(state, action: PayloadAction<Todo[]>) {
      state.items = action.payload;
      state.nextId = nextTodoId(action.payload);
      state.touched = true;
    },

    /** The remote sample list only seeds a list nobody has touched yet. */
    remoteTodosReceived(state, action: PayloadAction<Todo[]>) {
      if (state.touched) return;

      state.items = action.payload;
      state.nextId = nextTodoId(action.payload);
    },
  },
});

export const todosReducer = todosSlice.reducer;

export const {
  draftChanged,
  todoAdded,
  todoToggled,
  todoRemoved,
  completedCleared,
  filterChanged,
  todosReplaced,
  remoteTodosReceived,
} = todosSlice.actions;

// Memoized: filterTodos builds a new array on every call
export const selectVisibleTodos = createSelector(
  [
    (state: { todos: TodoListState }) => state.todos.items,
    (state: { todos: TodoListState }) => state.todos.filter,
  ],
  (items, filter): Todo[] => filterTodos(items, filter)
);

export function selectRemainingCount(state: { todos: TodoListState }): number {
  return state.todos.items.filter((item) => !item.completed).length;
}
