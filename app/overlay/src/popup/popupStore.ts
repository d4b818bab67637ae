import { configureStore } from "@reduxjs/toolkit";
import { popupSlice } from "./popupSlice.js";

export const createPopupStore = () => {
  return configureStore({
    reducer: popupSlice.reducer
  });
};

export type popupStore = ReturnType<typeof createPopupStore>;
