import { createApi, fetchBaseQuery } from "@reduxjs/toolkit/query/react";
import {
  decodeFolderTree,
  decodeValue,
  photoListSchema,
  todoListSchema,
  type DecodeResult,
  type FolderTree,
  type Photo,
  type Todo,
} from "@study-archive/shared";

type HelloResponse = { message: string };

/**
 * Every endpoint returns a DecodeResult rather than trusting the body. A
 * well-formed HTTP 200 with the wrong shape is still a failure the view has
 * to show.
 */
export function createApiSlice(baseUrl: string) {
  return createApi({
    reducerPath: "api",
    baseQuery: fetchBaseQuery({ baseUrl }),
    endpoints: (builder) => ({
      hello: builder.query<HelloResponse, void>({
        query: () => "hello",
      }),
      getPhotos: builder.query<DecodeResult<Photo[]>, void>({
        // IMPORTANT: keep paths relative to baseUrl
        query: () => "photos",
        transformResponse: (raw: unknown) => decodeValue(photoListSchema, raw),
      }),
      getFolders: builder.query<DecodeResult<FolderTree>, void>({
        query: () => "folders",
        transformResponse: (raw: unknown) => decodeFolderTree(raw),
      }),
      getTodos: builder.query<DecodeResult<Todo[]>, void>({
        query: () => "todos",
        transformResponse: (raw: unknown) => decodeValue(todoListSchema, raw),
      }),
    }),
  });
}

export type ApiSlice = ReturnType<typeof createApiSlice>;

/**
 * Reader-facing text for an RTK Query error.
 */
export function describeQueryError(error: unknown): string {
  if (typeof error === "object" && error !== null && "status" in error) {
    const status: unknown = error.status;
    if (typeof status === "number") return `HTTP ${status}`;
    if (typeof status === "string") return status.replaceAll("_", " ").toLowerCase();
  }

  return "Request failed";
}
