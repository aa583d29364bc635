export * from './aid.enum';
export * from './input-inhibited.enum';
export * from './oia-change.enum';
export * from './plane.enum';
export * from './response-format.enum';
export * from './shift-type.enum';
export * from './tn5250-orders.enum';
