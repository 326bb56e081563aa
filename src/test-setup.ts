// Keep stderr quiet under Jest
process.env.LOG_LEVEL = process.env.LOG_LEVEL ?? 'error';
