export * from './types';
export * from './math.util';
export * from './swing-detector';
export * from './structure-events';
export * from './fake-breakout-filter';
export * from './fvg-detector';
export * from './liquidity-sweeps';
export * from './evidence-scorer';
export * from './state-resolver';
export * from './structure-engine';
export * from './structure.module';
