import { createApiSlice } from "./store/api.js";

export const browserApi = createApiSlice("/api");

export const {
  useHelloQuery,
  useGetPhotosQuery,
  useGetFoldersQuery,
  useGetTodosQuery,
} = browserApi;
