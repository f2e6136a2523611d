/**
 * Invalid harvest or CLI configuration. Always raised before any request is made.
 */
export class ConfigurationError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}
