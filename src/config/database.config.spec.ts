import { buildDataSourceOptions } from './database.config';

describe('buildDataSourceOptions', () => {
  it('falls back to local defaults', () => {
    const options = buildDataSourceOptions({});
    expect(options).toMatchObject({
      type: 'postgres',
      host: 'localhost',
      port: 5432,
      username: 'postgres',
      database: 'clinic',
      synchronize: false,
      logging: false,
      ssl: false,
    });
  });

  it('reads connection settings from the environment', () => {
    const options = buildDataSourceOptions({
      DB_HOST: 'db.internal',
      DB_PORT: '6543',
      DB_NAME: 'clinic_test',
      DB_SSL: 'true',
      DB_LOGGING: '1',
    });
    expect(options).toMatchObject({
      host: 'db.internal',
      port: 6543,
      database: 'clinic_test',
      logging: true,
      ssl: { rejectUnauthorized: false },
    });
  });
});
