/**
 * Abstract secret store interface.
 * Implement this for each secret backend (AWS Secrets Manager, in-memory for tests).
 */
export interface SecretStore {
    readonly name: string;

    /**
     * Fetch the string value stored under `secretId`.
     * Rejects when the secret is missing, unreadable or not a string.
     */
    getSecretString(secretId: string): Promise<string>;
}
