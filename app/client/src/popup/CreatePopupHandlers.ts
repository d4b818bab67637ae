import type { PopupController } from "@overlay/popup/PopupController";

type textChangeEvent = {
  target: { value: string };
};

type keyEvent = {
  key: string;
  preventDefault: () => void;
};

export type popupHandlers = {
  handleChange: (event: textChangeEvent) => void;
  handleKeyDown: (event: keyEvent) => void;
};

export const createPopupHandlers = (controller: PopupController): popupHandlers => {
  return {
    handleChange: (event): void => {
      controller.handleTextChanged(event.target.value);
    },
    handleKeyDown: (event): void => {
      if (controller.handleKey(event.key)) {
        event.preventDefault();
      }
    }
  };
};
