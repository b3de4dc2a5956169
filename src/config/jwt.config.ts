import * as config from 'dotenv';

config.config();

export const jwtConfig = {
  secret: process.env.JWT_SECRET ?? '',
  signOptions: { expiresIn: process.env.JWT_EXPIRES_IN ?? '7d' },
};
