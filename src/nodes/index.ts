export { InsertCursorNode } from './insert-cursor.node';
export { RepeatToAddressNode } from './repeat-to-address.node';
export { SetBufferAddressNode } from './set-buffer-address.node';
export { StartFieldNode } from './start-field.node';
export { WriteDataNode } from './write-data.node';
