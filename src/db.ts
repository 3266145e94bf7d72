import { DataSource } from 'typeorm';
import { AppDataSource } from './data-source';

const createOrGetConnection = async (): Promise<DataSource> => {
  if (!AppDataSource.isInitialized) {
    await AppDataSource.initialize();
  }
  return AppDataSource;
};

export default createOrGetConnection;
