import type { JSX } from "react";
import type { PopupController } from "@overlay/popup/PopupController";
import { selectInputText, selectIsVisible, selectResultText } from "@overlay/popup/popupSlice";
import { usePopupSelector } from "../hooks/usePopupSelector";
import { createPopupHandlers } from "./CreatePopupHandlers";

type VocabularyPopupProps = {
  controller: PopupController;
  placeholder?: string;
};

export const VocabularyPopup = ({
  controller,
  placeholder = "Type a word"
}: VocabularyPopupProps): JSX.Element | null => {
  const isVisible = usePopupSelector(selectIsVisible);
  const inputText = usePopupSelector(selectInputText);
  const resultText = usePopupSelector(selectResultText);

  if (!isVisible) {
    return null;
  }

  const { handleChange, handleKeyDown } = createPopupHandlers(controller);

  return (
    <div className="vocabulary-popup">
      <input
        className="vocabulary-popup__input"
        value={inputText}
        placeholder={placeholder}
        spellCheck={false}
        onChange={handleChange}
        onKeyDown={handleKeyDown}
      />
      <div className="vocabulary-popup__result">{resultText}</div>
    </div>
  );
};
