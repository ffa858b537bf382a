import { createSlice, type PayloadAction } from "@reduxjs/toolkit";
import type { BootstrapPayload } from "@study-archive/shared";

export type AppState = {
  message: string | null;
  bootstrap: BootstrapPayload | null;
};

const initialAppState: AppState = {
  message: null,
  bootstrap: null,
};

const appSlice = createSlice({
  name: "app",
  initialState: initialAppState,
  reducers: {
    setMessage(state, action: PayloadAction<string>) {
      state.message = action.payload;
    },
    setBootstrap(state, action: PayloadAction<BootstrapPayload>) {
      state.bootstrap = action.payload;
    },
  },
});

export const appReducer = appSlice.reducer;

export const { setMessage, setBootstrap } = appSlice.actions;
