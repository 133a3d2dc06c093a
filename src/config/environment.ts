import 'dotenv/config';

function parseCategoryDeletePolicy(value: string | undefined): 'cascade' | 'restrict' {
  return value === 'restrict' ? 'restrict' : 'cascade';
}

export const ENV = {
  // Server Configuration
  SERVER_PORT: parseInt(process.env.SERVER_PORT || '9999', 10),
  HOST: process.env.HOST || '0.0.0.0',
  NODE_ENV: process.env.NODE_ENV || 'development',
  PUBLIC_URL: process.env.PUBLIC_URL || 'http://localhost:9999',
  COOKIE_SECRET: process.env.COOKIE_SECRET || '',
  RATE_LIMIT_MAX: parseInt(process.env.RATE_LIMIT_MAX || '100', 10),

  // MongoDB Configuration
  MONGODB_PROTOCOL: process.env.MONGODB_PROTOCOL || 'mongodb',
  MONGODB_CLUSTER_HOST: process.env.MONGODB_CLUSTER_HOST || '',
  MONGODB_NAME: process.env.MONGODB_NAME,
  MONGODB_USERNAME: process.env.MONGODB_USERNAME,
  MONGODB_PASSWORD: process.env.MONGODB_PASSWORD,

  // SMTP Configuration
  SMTP_ENDPOINT: process.env.SMTP_ENDPOINT || 'smtp.gmail.com',
  SMTP_PORT: parseInt(process.env.SMTP_PORT || '465', 10),
  SMTP_USER_NAME: process.env.SMTP_USER_NAME || '',
  SMTP_PASSWORD: process.env.SMTP_PASSWORD || '',
  MAIL_FROM: process.env.MAIL_FROM || process.env.SMTP_USER_NAME || 'noreply@localhost',

  // JWT Configuration
  JWT_SECRET: process.env.JWT_SECRET,
  JWT_EXPIRES_IN: process.env.JWT_EXPIRES_IN || '30d',

  // Security Configuration
  BCRYPT_ROUNDS: parseInt(process.env.BCRYPT_ROUNDS || '12', 10),
  CONFIRMATION_CODE_SINGLE_USE: process.env.CONFIRMATION_CODE_SINGLE_USE === 'true',

  // Listing & catalogue behaviour
  API_PAGE_SIZE: parseInt(process.env.API_PAGE_SIZE || '10', 10),
  CATEGORY_DELETE_POLICY: parseCategoryDeletePolicy(process.env.CATEGORY_DELETE_POLICY),
} as const;

// Type for environment variables
export type Environment = typeof ENV;

// Validation function
export function validateEnvironment(): void {
  const required = [
    'MONGODB_CLUSTER_HOST',
    'MONGODB_NAME',
    'JWT_SECRET'
  ];

  for (const key of required) {
    if (!process.env[key]) {
      console.warn(`⚠️ Warning: ${key} is not set`);
    }
  }

  console.log('✅ Environment configuration loaded');
}
