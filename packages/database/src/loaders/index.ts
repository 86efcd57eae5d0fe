export { loadEcoDatabase, defaultEcoSourceFiles, getDataDir, type EcoLoadOptions } from './eco-loader.js';
