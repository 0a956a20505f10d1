// LowDB Repository exports

export { DatabaseConnection, openDatabase } from './connection.js';
export { CharacterRepository } from './CharacterRepository.js';
export { GameStateRepository } from './GameStateRepository.js';

export type { DatabaseConfig } from './connection.js';
