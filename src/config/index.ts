export { getTierflowDir, ensureTierflowDir, getConfigPath, loadConfig, saveConfig } from './loader.js';
