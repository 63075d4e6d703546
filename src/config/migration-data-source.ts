import 'reflect-metadata';
import dotenv from 'dotenv';
import { loadConfig } from './config';
import { createDataSource } from './data-source';

dotenv.config();

// Entry point for the TypeORM CLI (`npm run migration:run`).
export default createDataSource(loadConfig());
