import dotenv from 'dotenv';

// Load before any module that reads process.env at import time (the logger does)
dotenv.config();
