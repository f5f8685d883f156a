export * from './languages';
export * from './complexity-constants';
export * from './review-constants';
