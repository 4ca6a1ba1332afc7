export * from './windowActions';
export * from './windowConfig';
