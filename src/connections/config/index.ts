export { appConfig } from './app.config';
export { dbConfig } from './database.config';
