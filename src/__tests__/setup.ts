process.env.LOG_SILENT = 'true';
