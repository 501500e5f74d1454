import type { Config } from 'jest';

const config: Config = {
  preset: 'ts-jest',
  testEnvironment: 'node',
  roots: ['<rootDir>/src', '<rootDir>/tests'],
  testMatch: ['**/?(*.)+(spec|test).ts'],
  moduleNameMapper: {
    '^(\\.{1,2}/.*)\\.js$': '$1',
    '^@core/(.*)\\.js$': '<rootDir>/src/core/$1',
    '^@config/(.*)\\.js$': '<rootDir>/src/config/$1',
    '^@infra/(.*)\\.js$': '<rootDir>/src/infra/$1',
    '^@interfaces/(.*)\\.js$': '<rootDir>/src/interfaces/$1',
    '^@modules/(.*)\\.js$': '<rootDir>/src/modules/$1',
    '^@shared/(.*)\\.js$': '<rootDir>/src/shared/$1'
  },
  clearMocks: true,
  collectCoverageFrom: ['src/**/*.ts', '!src/**/*.d.ts'],
  setupFiles: ['<rootDir>/tests/setup.ts']
};

export default config;
