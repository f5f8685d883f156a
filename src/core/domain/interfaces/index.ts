export * from './phrase-scheduler.interface';
export * from './vocabulary-persistence.interface';
export * from './conversation-collaborator.interface';
