import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({
            port: 5000,
            persist: false,
            dataFile: 'data_store.json',
            paymentLinkBase: 'https://payments.example/university/pay',
            paymentTtlMinutes: 60,
            otpTtlMinutes: 5,
            leavePolicy: {
                reasonThresholdDays: 3,
                typeThresholdDays: 2,
                restrictedTypes: ['maternity', 'medical']
            },
            logLevel: 'info'
        });
    });

    it('reads overrides from the environment', () => {
        const config = loadConfig({
            PORT: '8081',
            PERSIST: 'true',
            PAYMENT_LINK_BASE: 'https://pay.test/links/',
            LEAVE_REASON_THRESHOLD_DAYS: '5'
        });

        expect(config.port).toBe(8081);
        expect(config.persist).toBe(true);
        expect(config.paymentLinkBase).toBe('https://pay.test/links');
        expect(config.leavePolicy.reasonThresholdDays).toBe(5);
    });

    it('refuses invalid values', () => {
        expect(() => loadConfig({ PORT: 'abc' })).toThrow(/PORT/);
        expect(() => loadConfig({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
    });
});
