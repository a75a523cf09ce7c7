import { Router, Request, Response } from 'express';
import { TocgenConfig, isRecord, resolveTitle } from '../config.js';
import { TocError } from '../errors.js';
import { DEFAULT_INDENT, generateToc } from '../generate.js';
import { listInputFormats, listOutputFormats } from '../formats.js';

/**
 * Body accepted by POST /api/toc
 */
interface TocRequestBody {
  text: string;
  inputFormat: string;
  outputFormat?: string;
  indent?: number;
  customAnchors?: boolean;
  title?: string | null;
}

/**
 * Check field types; returns an error message or the typed body
 */
function readTocRequest(body: unknown): TocRequestBody | string {
  if (!isRecord(body)) {
    return 'Request body must be a JSON object';
  }
  const { text, inputFormat, outputFormat, indent, customAnchors, title } = body;

  if (typeof text !== 'string') {
    return 'Field "text" is required';
  }
  if (inputFormat !== undefined && typeof inputFormat !== 'string') {
    return 'Field "inputFormat" must be a string';
  }
  if (outputFormat !== undefined && typeof outputFormat !== 'string') {
    return 'Field "outputFormat" must be a string';
  }
  if (indent !== undefined && typeof indent !== 'number') {
    return 'Field "indent" must be a number';
  }
  if (customAnchors !== undefined && typeof customAnchors !== 'boolean') {
    return 'Field "customAnchors" must be a boolean';
  }
  if (title !== undefined && title !== null && typeof title !== 'string') {
    return 'Field "title" must be a string or null';
  }

  return { text, inputFormat: inputFormat ?? 'markdown', outputFormat, indent, customAnchors, title };
}

/**
 * Create API routes for ToC generation.
 * Config supplies the defaults for anything a request leaves out.
 */
export function createApiRoutes(config: TocgenConfig = {}): Router {
  const router = Router();

  /**
   * POST /api/toc
   * Render a table of contents for the posted document text
   * Body: { text, inputFormat?, outputFormat?, indent?, customAnchors?, title? }
   */
  router.post('/toc', (req: Request, res: Response) => {
    const request = readTocRequest(req.body);

    if (typeof request === 'string') {
      res.status(400).json({ error: request });
      return;
    }

    try {
      const toc = generateToc(request.text, {
        inputFormat: request.inputFormat,
        outputFormat: request.outputFormat ?? config.outputFormat ?? 'markdown',
        indent: request.indent ?? config.indent ?? DEFAULT_INDENT,
        customAnchors: request.customAnchors ?? config.customAnchors ?? false,
        title: request.title === undefined ? resolveTitle(config) : request.title ?? undefined
      });
      res.json({ toc });
    } catch (err) {
      if (err instanceof TocError) {
        res.status(err.statusCode).json({ error: err.message });
        return;
      }
      throw err;
    }
  });

  /**
   * GET /api/formats
   * List the registered input and output formats
   */
  router.get('/formats', (_req: Request, res: Response) => {
    res.json({
      inputFormats: listInputFormats(),
      outputFormats: listOutputFormats()
    });
  });

  return router;
}
