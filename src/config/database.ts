import { Sequelize, SequelizeOptions } from 'sequelize-typescript';
import { settings, DatabaseSettings } from './settings';
import { logger, errorMessage } from '../utils/logger';
import { User } from '../models/User';
import { Currency } from '../models/Currency';
import { Brand } from '../models/Brand';
import { Influencer } from '../models/Influencer';
import { PlatformSetting } from '../models/PlatformSetting';
import { PlatformConnection } from '../models/PlatformConnection';
import { Campaign } from '../models/Campaign';
import { Submission } from '../models/Submission';
import { Payout } from '../models/Payout';
import { PaymentTransaction } from '../models/PaymentTransaction';
import { PaymentMethod } from '../models/PaymentMethod';
import { VerificationQueueItem } from '../models/VerificationQueueItem';

export const models = [
  User,
  Currency,
  Brand,
  Influencer,
  PlatformSetting,
  PlatformConnection,
  Campaign,
  Submission,
  Payout,
  PaymentTransaction,
  PaymentMethod,
  VerificationQueueItem,
];

export const buildSequelizeOptions = (db: DatabaseSettings): SequelizeOptions => {
  const common: SequelizeOptions = {
    models,
    logging: db.logging ? (sql: string) => logger.debug(sql) : false,
  };

  if (db.dialect === 'sqlite') {
    return { ...common, dialect: 'sqlite', storage: db.storage };
  }

  return {
    ...common,
    dialect: 'mysql',
    host: db.host,
    port: db.port,
    username: db.username,
    password: db.password,
    database: db.name,
    pool: {
      max: 5,
      min: 0,
      acquire: 30000,
      idle: 10000
    }
  };
};

export const sequelize = new Sequelize(buildSequelizeOptions(settings.database));

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/**
 * Connect and sync the schema, retrying while the database comes up.
 * Resolves false when every attempt failed; the API then runs degraded.
 */
export const dbConnect = async (retries = 5, delay = 5000): Promise<boolean> => {
  for (let i = 0; i < retries; i++) {
    try {
      await sequelize.authenticate();
      logger.info('Database connection has been established successfully.');
      await sequelize.sync();
      return true;
    } catch (error) {
      logger.error(`Unable to connect to the database (Attempt ${i + 1}/${retries})`, { error: errorMessage(error) });
      if (i < retries - 1) {
        logger.info(`Retrying database connection in ${delay / 1000} seconds...`);
        await sleep(delay);
      }
    }
  }

  logger.error('Max retries reached. Database connection failed. Application will start but DB features will be unavailable.');
  return false;
};
