import cors from 'cors';
import express, { type ErrorRequestHandler, type Response } from 'express';
import multer from 'multer';
import { InvalidUploadError, LedgerError } from './application/errors/LedgerErrors.js';
import { isExcelFileName } from './infrastructure/adapters/contacts/XlsxContactBookReader.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';

const container = new AppContainer();
const { server: serverConfig } = container.config;

const app = express();

// Uploads stay in memory; both files are consumed within the request.
const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: serverConfig.uploadMaxBytes,
  },
  fileFilter: (req, file, cb) => {
    if (file.fieldname === 'contact_file' && !isExcelFileName(file.originalname)) {
      cb(new InvalidUploadError('Contact file must be an Excel (.xlsx / .xls)'));
    } else {
      cb(null, true);
    }
  },
});

app.use(cors({ origin: serverConfig.corsOrigins, credentials: true }));
app.use(express.json({ limit: '2mb' }));

const sendError = (res: Response, error: unknown, fallback: string) => {
  if (error instanceof LedgerError) {
    return res.status(error.status).json({ error: error.message });
  }

  const message = error instanceof Error ? error.message : fallback;
  console.error(`${fallback}:`, error);
  return res.status(500).json({ error: message });
};

const utf8 = new TextDecoder('utf-8');

app.get('/api/health', (req, res) => {
  res.json({
    name: 'Ghost Fund Ledger API',
    version: '1.0.0',
    timezone: container.config.app.timezone,
    storage: container.storage.kind,
  });
});

app.post(
  '/api/upload',
  upload.fields([
    { name: 'contact_file', maxCount: 1 },
    { name: 'txt_file', maxCount: 1 },
  ]),
  async (req, res) => {
    try {
      const files = Array.isArray(req.files) ? undefined : req.files;
      const contactFile = files?.contact_file?.[0];
      const txtFile = files?.txt_file?.[0];

      if (!contactFile || !txtFile) {
        throw new InvalidUploadError('Both contact_file and txt_file are required');
      }

      const result = await container.ingestionService.ingestExport({
        contactBook: contactFile.buffer,
        contactBookFileName: contactFile.originalname,
        exportText: utf8.decode(txtFile.buffer),
      });

      console.log('✅ Chat export ingested:', {
        contactFile: contactFile.originalname,
        txtFile: txtFile.originalname,
        newRowsAdded: result.newRowsAdded,
        totalRowsInData: result.totalRowsInData,
      });

      res.json(result);
    } catch (error) {
      sendError(res, error, 'Unable to ingest chat export');
    }
  },
);

app.get('/api/ledger', async (req, res) => {
  try {
    const { rows } = await container.storage.readLedger();
    res.json({ rows });
  } catch (error) {
    sendError(res, error, 'Unable to load ledger');
  }
});

app.get('/api/summary', async (req, res) => {
  try {
    const { summary } = await container.storage.readLedger();
    res.json({ summary });
  } catch (error) {
    sendError(res, error, 'Unable to load summary');
  }
});

app.get('/api/members', async (req, res) => {
  try {
    const list = await container.reportService.listSavers();
    res.json({ list });
  } catch (error) {
    sendError(res, error, 'Unable to list savers');
  }
});

app.get('/api/members/:identifier', async (req, res) => {
  try {
    const report = await container.reportService.buildMemberReport(req.params.identifier);
    res.json(report);
  } catch (error) {
    sendError(res, error, 'Unable to build member report');
  }
});

app.get('/api/how-saved', async (req, res) => {
  try {
    const entries = await container.reportService.listNarratives();
    res.json({ total: entries.length, entries });
  } catch (error) {
    sendError(res, error, 'Unable to list how-saved entries');
  }
});

app.use('/api', (req, res) => {
  res.status(404).json({ error: 'API endpoint not found' });
});

// Multer and body-parser failures land here.
const handleUploadErrors: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof multer.MulterError) {
    return res.status(400).json({ error: error.message });
  }

  return sendError(res, error, 'Request failed');
};

app.use(handleUploadErrors);

app.listen(serverConfig.port, () => {
  console.log(`🚀 Ghost Fund ledger API listening on port ${serverConfig.port}`);
  console.log(`🕰️ Timezone: ${container.config.app.timezone}`);
  console.log(`📒 Ledger storage: ${container.storage.kind}`);
});
