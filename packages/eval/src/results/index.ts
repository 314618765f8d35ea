export * from './attempt';
export * from './aggregator';
export * from './comparator';
export * from './store';
