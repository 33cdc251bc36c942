export { Popup, MessagePopup, type PopupHost, type PopupKind, type PopupOptions } from './popup.js';
export { YesNoPopup, type YesNoCommand } from './yes-no.js';
export { TextBoxPopup, type TextCommand } from './text-box.js';
export { MenuPopup, type MenuCommand, type MenuPopupOptions } from './menu.js';
export { LoadingIconPopup, LoadingBarPopup } from './loading.js';
export { FormPopup, FormFieldElement, type FormCommand } from './form.js';
export { FileDialogPopup, FileDialogItem, type FileDialogCommand, type FileDialogOptions } from './file-dialog.js';
