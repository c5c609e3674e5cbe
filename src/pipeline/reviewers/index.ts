export * from './reviewerPool';
export * from './consensus';
