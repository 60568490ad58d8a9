import dotenv from 'dotenv';
import { ConfigurationError } from '../../application/errors.js';
import { loadConfig, type AppConfig } from '../config.js';
import { createPool } from '../db/pool.js';
import { UserRepo } from '../db/userRepo.js';
import { KitchenRepo } from '../db/kitchenRepo.js';
import { RecipeRepo } from '../db/recipeRepo.js';
import { createApp } from './app.js';

dotenv.config();

function readConfig(): AppConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
}

const config = readConfig();

if (!config.databaseUrl) {
  console.error('DATABASE_URL environment variable is required');
  process.exit(1);
}

const pool = createPool(config.databaseUrl);

const app = createApp({
  config,
  users: new UserRepo(pool),
  kitchens: new KitchenRepo(pool),
  recipes: new RecipeRepo(pool),
  healthCheck: () => pool.query('SELECT 1'),
});

// Start server
app.listen(config.port, () => {
  console.log(`Server running on http://localhost:${config.port}`);
  console.log(`Health check: http://localhost:${config.port}/healthz`);
  console.log(`API docs: http://localhost:${config.port}/docs`);
});
