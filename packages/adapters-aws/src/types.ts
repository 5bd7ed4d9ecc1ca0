/** Progress callback for adapter services; defaults to a no-op */
export type AwsLogCallback = (message: string) => void;

export const noopLog: AwsLogCallback = () => {};
