/**
 * @fileoverview To-do list page
 *
 * DATA LOADING STRATEGY:
 * The list itself lives in the todos slice. RTK Query only supplies the
 * sample list from /api/todos, which seeds the slice until the reader
 * changes something or a saved list is restored from localStorage.
 *
 * SSR: the bootstrap payload seeds both the slice and the query cache, so
 * the hook below finds cached data and nothing is fetched.
 */
import React from "react";
import { describeRemaining, TODO_FILTERS } from "@study-archive/shared";
import { useGetTodosQuery } from "../browserApi.js";
import { useAppDispatch, useAppSelector } from "../store/hooks.js";
import {
  completedCleared,
  draftChanged,
  filterChanged,
  remoteTodosReceived,
  selectVisibleTodos,
  todoAdded,
  todoRemoved,
  todoToggled,
} from "../store/todosSlice.js";

export default function TodosPage() {
  const dispatch = useAppDispatch();
  const { data, error, refetch } = useGetTodosQuery();
  const { draft, filter, items } = useAppSelector((state) => state.todos);
  const visible = useAppSelector(selectVisibleTodos);

  React.useEffect(() => {
    if (!data) return;
    if (data.ok) {
      dispatch(remoteTodosReceived(data.data));
    } else {
      console.warn(`[todos] could not decode sample todos: ${data.error}`);
    }
  }, [data, dispatch]);

  return (
    <div className="todos">
      <h2>Todos</h2>

      {error && (
        <p className="error">
          Could not load the sample list.{" "}
          <button type="button" onClick={() => void refetch()}>
            Retry
          </button>
        </p>
      )}

      <form
        onSubmit={(event) => {
          event.preventDefault();
          dispatch(todoAdded());
        }}
      >
        <input
          aria-label="New todo"
          placeholder="What needs to be done?"
          value={draft}
          onChange={(event) => dispatch(draftChanged(event.target.value))}
        />
        <button type="submit">Add</button>
      </form>

      {visible.length > 0 ? (
        <ul>
          {visible.map((todo) => (
            <li key={todo.id} className={todo.completed ? "completed" : undefined}>
              <label>
                <input
                  type="checkbox"
                  checked={todo.completed}
                  onChange={() => dispatch(todoToggled(todo.id))}
                />
                {todo.title}
              </label>
              <button
                type="button"
                aria-label={`Remove ${todo.title}`}
                onClick={() => dispatch(todoRemoved(todo.id))}
              >
                ×
              </button>
            </li>
          ))}
        </ul>
      ) : (
        <p>No todos found.</p>
      )}

      <footer className="todos-footer">
        <span>{describeRemaining(items)}</span>
        {TODO_FILTERS.map((option) => (
          <button
            key={option}
            type="button"
            aria-pressed={option === filter}
            onClick={() => dispatch(filterChanged(option))}
          >
            {option}
          </button>
        ))}
        <button type="button" onClick={() => dispatch(completedCleared())}>
          Clear completed
        </button>
      </footer>
    </div>
  );
}
