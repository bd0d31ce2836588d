import express from 'express';
import cors from 'cors';
import dotenv from 'dotenv';
import bomRoutes from './routes/bom';
import { isDatabaseConfigured, testConnection } from './services/database';
import { loadBomConfig } from './config';
import { CALCULATION_VERSION } from './constants';

dotenv.config();

const app = express();
const PORT = process.env.PORT || 3000;

app.use(cors());
app.use(express.json({ limit: '10mb' })); // CSV text and base64 workbooks travel in JSON

// Health check
app.get('/health', (req, res) => {
  res.json({
    status: 'ok',
    version: CALCULATION_VERSION,
    database: isDatabaseConfigured() ? 'configured' : 'not configured',
    endpoints: {
      explode: '/api/v1/bom/explode',
      compare: '/api/v1/bom/compare',
      export: '/api/v1/bom/compare/export'
    }
  });
});

app.use('/api/v1/bom', bomRoutes);

async function startServer(): Promise<void> {
  const dbConfigured = isDatabaseConfigured();
  let dbConnected = false;

  if (dbConfigured) {
    dbConnected = await testConnection();
  }

  const { limits, rootPolicy } = loadBomConfig();

  app.listen(PORT, () => {
    console.log(`🚀 BOM Explosion API ${CALCULATION_VERSION} running on port ${PORT}`);
    console.log('');
    console.log('📊 Database Status:');
    if (!dbConfigured) {
      console.log('   ⚠️  Not configured - stored BOMs unavailable');
    } else if (dbConnected) {
      console.log('   ✅ Connected to Supabase');
    } else {
      console.log('   ❌ Configured but connection failed');
    }
    console.log('');
    console.log(`🌳 Explosion: max_depth=${limits.maxDepth}, max_paths=${limits.maxPaths}, root_policy=${rootPolicy}`);
    console.log('');
    console.log('📌 API Endpoints:');
    console.log(`   Health:       http://localhost:${PORT}/health`);
    console.log(`   Explode:      POST http://localhost:${PORT}/api/v1/bom/explode`);
    console.log(`   Compare:      POST http://localhost:${PORT}/api/v1/bom/compare`);
    console.log(`   Export:       POST http://localhost:${PORT}/api/v1/bom/compare/export`);
    console.log(`   Stored BOM:   POST http://localhost:${PORT}/api/v1/bom/stored/:bomId/explode`);
    console.log(`   DB Status:    http://localhost:${PORT}/api/v1/bom/db-status`);
  });
}

if (require.main === module) {
  startServer().catch(err => {
    console.error('❌ Failed to start server:', err);
    process.exit(1);
  });
}

export default app;
