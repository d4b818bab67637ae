import { createSlice, type PayloadAction } from "@reduxjs/toolkit";
import type { popupPosition } from "../contracts/PopupSurface.js";

export type popupVisibility = "hidden" | "visible";

export type popupState = {
  visibility: popupVisibility;
  inputText: string;
  resultText: string;
  position: popupPosition | null;
};

const initialState: popupState = {
  visibility: "hidden",
  inputText: "",
  resultText: "",
  position: null
};

export const popupSlice = createSlice({
  name: "popup",
  initialState,
  reducers: {
    popupShown: (state, action: PayloadAction<popupPosition | null>): void => {
      state.visibility = "visible";
      state.inputText = "";
      state.resultText = "";
      if (action.payload) {
        state.position = action.payload;
      }
    },
    popupHidden: (state): void => {
      state.visibility = "hidden";
    },
    inputCleared: (state): void => {
      state.inputText = "";
      state.resultText = "";
    },
    lookupCompleted: (
      state,
      action: PayloadAction<{
        inputText: string;
        resultText: string;
      }>
    ): void => {
      state.inputText = action.payload.inputText;
      state.resultText = action.payload.resultText;
    }
  }
});

export const { popupShown, popupHidden, inputCleared, lookupCompleted } = popupSlice.actions;

export const selectIsVisible = (state: popupState): boolean => state.visibility === "visible";
export const selectInputText = (state: popupState): string => state.inputText;
export const selectResultText = (state: popupState): string => state.resultText;
