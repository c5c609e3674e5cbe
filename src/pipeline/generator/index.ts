export * from './proposalGenerator';
export * from './categories';
