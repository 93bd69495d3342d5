export const ENV = {
    NODE_ENV: process.env.NODE_ENV ?? 'development',
    LOG_LEVEL: process.env.LOG_LEVEL ?? 'info',
    MONITOR_CONFIG: process.env.MONITOR_CONFIG ?? 'config/monitor.json',
    DATA_DIR: process.env.DATA_DIR ?? 'data',
    HTTP_PROXY: process.env.HTTP_PROXY ?? '',
}
