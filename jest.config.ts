import type { Config } from 'jest';

const config: Config = {
  preset: 'ts-jest',
  testEnvironment: 'node',
  roots: ['<rootDir>/src', '<rootDir>/test'],
  moduleFileExtensions: ['ts', 'js', 'json'],
  testMatch: ['**/*.spec.ts', '**/*.e2e-spec.ts'],
  transform: {
    '^.+\\.ts$': [
      'ts-jest',
      {
        tsconfig: {
          module: 'commonjs',
          moduleResolution: 'node10',
          target: 'ES2021',
          esModuleInterop: true,
          resolveJsonModule: true,
          isolatedModules: false,
          emitDecoratorMetadata: true,
          experimentalDecorators: true,
          useDefineForClassFields: false,
          skipLibCheck: true,
          strict: true,
          types: ['jest', 'node', 'multer'],
        },
        diagnostics: false,
      },
    ],
  },
  collectCoverageFrom: ['src/**/*.ts', '!src/**/main.ts', '!src/**/*.module.ts'],
  coverageDirectory: 'coverage',
  coverageReporters: ['text', 'lcov'],
  setupFilesAfterEnv: ['<rootDir>/test/setup/jest-setup.ts'],
};

export default config;
