import type { JSX } from "react";
import { Provider } from "react-redux";
import type { PopupController } from "@overlay/popup/PopupController";
import { VocabularyPopup } from "./VocabularyPopup";

type VocabularyPopupRootProps = {
  controller: PopupController;
};

export const VocabularyPopupRoot = ({ controller }: VocabularyPopupRootProps): JSX.Element => {
  return (
    <Provider store={controller.store}>
      <VocabularyPopup controller={controller} />
    </Provider>
  );
};
