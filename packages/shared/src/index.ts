export * from './constants';
export * from './types/matches';
export * from './types/predictions';
export * from './types/api';
export * from './schemas/match.schema';
export * from './utils';
