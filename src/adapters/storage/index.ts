export { JsonFileVocabularyPersistence } from './json-file-vocabulary-persistence';
