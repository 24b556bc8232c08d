export { GammaMarketDirectory, scheduleFor, extractContracts } from './GammaMarketDirectory.js';
export type { WindowSchedule } from './GammaMarketDirectory.js';
export { createMarketWindow, minutesLeft, InvalidMarketWindowError } from './window.js';
export type { MarketWindowInput } from './window.js';
export type { MarketDirectory, GammaMarketDirectoryConfig } from './types.js';
