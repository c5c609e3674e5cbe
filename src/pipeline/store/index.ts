export * from './proposalStore';
export * from './transitions';
