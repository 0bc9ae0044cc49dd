export class NotInitializedError extends Error {
  constructor(component: string) {
    super(`${component} used before initialize() completed`);
    this.name = 'NotInitializedError';
  }
}

export const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));
