/**
 * Environment enumeration
 *
 * Shared enum for application environment types to avoid circular dependencies.
 */
export enum Environment {
  // eslint-disable-next-line no-unused-vars
  Development = "development",
  // eslint-disable-next-line no-unused-vars
  Production = "production",
  // eslint-disable-next-line no-unused-vars
  Test = "test",
}

export function parseEnvironment(value: string | undefined): Environment {
  switch (value) {
    case Environment.Production:
      return Environment.Production;
    case Environment.Test:
      return Environment.Test;
    default:
      return Environment.Development;
  }
}
