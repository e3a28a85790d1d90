import 'reflect-metadata';

import { DataSource } from 'typeorm';

import { StudentAccount } from '../students/entities/student-account.entity';

export const AppDataSource = new DataSource({
  type: 'postgres',
  url: process.env.DATABASE_URL,
  synchronize: false,
  logging: false,
  entities: [StudentAccount],
  migrations: [__dirname + '/migrations/*{.ts,.js}'],
});

export default AppDataSource;
