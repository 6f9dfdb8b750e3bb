import * as v from 'valibot';
import { ServiceCoreSettingsSchema, type ServiceCoreSettings } from '@/schemas';

export class SettingsValidationError extends Error {
    readonly code = 'INVALID_SETTINGS';

    constructor(readonly issues: readonly string[]) {
        super(`Invalid settings: ${issues.join('; ')}`);
        this.name = 'SettingsValidationError';
    }
}

/**
 * Validates a partial settings object and fills in every default.
 */
export class SettingsInitializer {
    resolve(input: unknown): ServiceCoreSettings {
        const result = v.safeParse(ServiceCoreSettingsSchema, input ?? {});
        if (!result.success) {
            throw new SettingsValidationError(
                result.issues.map(issue => `${v.getDotPath(issue) ?? '(root)'}: ${issue.message}`)
            );
        }
        return result.output;
    }
}
