import type { Config } from 'jest';

const config: Config = {
  preset: 'ts-jest',
  testEnvironment: 'node',
  roots: ['<rootDir>/testbed/test', '<rootDir>/store/test'],
  testMatch: ['**/*.test.ts'],
  moduleNameMapper: {
    '^@initrack/(common|tracker|store)$': '<rootDir>/$1/src/index.ts',
  },
};

export default config;
