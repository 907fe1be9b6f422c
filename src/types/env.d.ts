declare global {
    namespace NodeJS {
        // Keys are listed in .env.example, dotenv-safe fails the start when one is missing.
        // Values may be empty, config.ts falls back to defaults.
        interface ProcessEnv {
            PORT?: string,
            DEFAULT_TIMEOUT?: string,
            DEFAULT_CONCURRENCY?: string,
            REAL_IP_CACHE_TTL?: string,
            ECHO_URL?: string,
            HTTPS_TEST_URL?: string,
            GEOLOCATION_URL?: string,
            SPEED_TEST_URL?: string,
            DNSBL_ZONE?: string,
        }
    }
}

export {};
