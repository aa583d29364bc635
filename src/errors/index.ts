export { InvalidOptionError } from './invalid-option.error';
export { BufferPositionError } from './buffer-position.error';
export { UnsupportedOrderError } from './unsupported-order.error';
export { IncompleteOrderError } from './incomplete-order.error';
