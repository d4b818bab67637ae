import { useSelector, type TypedUseSelectorHook } from "react-redux";
import type { popupState } from "@overlay/popup/popupSlice";

export const usePopupSelector: TypedUseSelectorHook<popupState> = useSelector;
