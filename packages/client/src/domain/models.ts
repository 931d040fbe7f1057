export class ApiError extends Error {
    constructor(
        public message: string,
        public isTransient: boolean, // true for ECONNREFUSED/ECONNRESET or 5xx, false for 4xx (bad input)
        public statusCode?: number
    ) {
        super(message);
        this.name = 'ApiError';
    }
}

export interface HealthStatus {
    isOnline: boolean;
    latencyMs: number;
}
