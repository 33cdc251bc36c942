export { Widget, type KeyCommand } from './widget.js';
export { ScrollMenu, type ScrollMenuOptions, type ItemFormatter } from './scroll-menu.js';
export { CheckboxMenu, type CheckboxMenuOptions } from './checkbox-menu.js';
export { TextBox, type TextBoxOptions } from './text-box.js';
export { ScrollTextBlock, type TextBlockOptions } from './text-block.js';
export { Label, BlockLabel } from './label.js';
export { Button, type ButtonCommand } from './button.js';
export { SliderWidget, type SliderOptions } from './slider.js';
