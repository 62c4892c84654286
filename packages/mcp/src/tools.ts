/**
 * @module tools
 * MCP tool definitions and handlers for the raster edit session.
 *
 * Each tool has a JSON Schema input definition for ListTools and a zod schema
 * the handler validates against before touching the session. Handlers never
 * throw: failures come back as an `Error: ...` text block with `isError` set.
 */

import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { FilterKind } from '@raster-edit/types';
import {
  AVAILABLE_FILTERS,
  DEFAULT_FILTER_PARAMETERS,
  NoCurrentImageError,
  PARAMETRIC_FILTERS,
  RasterEditError,
  applyFilter,
  decodeRasterPng,
  encodeRasterPng,
  histogramTotal,
  parseFilterKind,
  redo,
  reset,
  undo,
} from '@raster-edit/core';
import type { EditSession, SessionLogger } from '@raster-edit/core';
import { resolveImagePath } from './config.js';
import type { ServerConfig } from './config.js';

/** What every tool handler works against. */
export interface ToolContext {
  session: EditSession;
  config: ServerConfig;
  logger: SessionLogger;
}

const NO_ARGS = { type: 'object' as const, properties: {} };

/** All MCP tool definitions for ListTools. */
export const TOOLS: Tool[] = [
  // ── Files ──────────────────────────────────────────────────────
  {
    name: 'load_image',
    description:
      'Load a PNG file into the edit session. Replaces the current image and clears undo/redo history. ' +
      'Relative paths resolve against the server root.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: { type: 'string', description: 'Path to a PNG file (8-bit gray, RGB or RGBA)' },
      },
      required: ['path'],
    },
  },
  {
    name: 'save_image',
    description: 'Write the current image as an RGBA PNG file and mark the session as saved.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        path: { type: 'string', description: 'Destination path. Parent directories are created.' },
      },
      required: ['path'],
    },
  },

  // ── Editing ────────────────────────────────────────────────────
  {
    name: 'apply_filter',
    description:
      'Apply a filter to the current image. Filters: Grayscale, Sepia, Brightness, Contrast, ' +
      'BrightnessContrast, GaussianBlur, EdgeDetection, None. Names are case-insensitive and may ' +
      'use dashes or underscores (e.g. "gaussian-blur").',
    inputSchema: {
      type: 'object' as const,
      properties: {
        filter: { type: 'string', description: 'Filter name' },
        brightness: { type: 'number', description: 'Brightness, -100 to 100 (default 0)' },
        contrast: { type: 'number', description: 'Contrast, -100 to 100 (default 0)' },
        blurRadius: { type: 'number', description: 'Blur radius in pixels, 1 to 10 (default 3)' },
      },
      required: ['filter'],
    },
  },
  {
    name: 'undo',
    description: 'Undo the last edit. Up to 20 edits are kept.',
    inputSchema: NO_ARGS,
  },
  {
    name: 'redo',
    description: 'Redo the last undone edit.',
    inputSchema: NO_ARGS,
  },
  {
    name: 'reset_image',
    description: 'Restore the image as it was loaded. The reset itself can be undone.',
    inputSchema: NO_ARGS,
  },

  // ── Read-only / Inspection ─────────────────────────────────────
  {
    name: 'get_session_info',
    description: 'Get image dimensions, dirty flag, undo/redo availability and the last status message.',
    inputSchema: NO_ARGS,
  },
  {
    name: 'get_histogram',
    description: 'Get the 256-bin red, green and blue histograms of the current image.',
    inputSchema: NO_ARGS,
  },
  {
    name: 'get_preview',
    description: 'Return the current image as a PNG image block so the model can see it.',
    inputSchema: NO_ARGS,
  },
  {
    name: 'list_filters',
    description: 'List the filters apply_filter accepts and the parameters each one reads.',
    inputSchema: NO_ARGS,
  },
];

// ── Argument schemas ───────────────────────────────────────────

const PathArgs = z.object({
  path: z.string().min(1),
});

// Out-of-range values are accepted; the filters clamp their output.
const ApplyFilterArgs = z.object({
  filter: z.string().min(1),
  brightness: z.number().finite().optional(),
  contrast: z.number().finite().optional(),
  blurRadius: z.number().finite().optional(),
});

class ToolArgumentError extends Error {
  constructor(toolName: string, error: z.ZodError) {
    const details = error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    super(`Invalid arguments for ${toolName}: ${details}`);
    this.name = 'ToolArgumentError';
  }
}

function parseArgs<T>(schema: z.ZodType<T>, toolName: string, args: Record<string, unknown>): T {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    throw new ToolArgumentError(toolName, parsed.error);
  }
  return parsed.data;
}

/**
 * Handle an MCP tool call against the session in `context`.
 */
export async function handleToolCall(
  toolName: string,
  args: Record<string, unknown>,
  context: ToolContext,
): Promise<ToolResult> {
  const { session, config } = context;
  try {
    switch (toolName) {
      case 'load_image': {
        const { path: file } = parseArgs(PathArgs, toolName, args);
        const target = resolveImagePath(config, file);
        const buffer = decodeRasterPng(await readFile(target));
        await session.load(buffer);
        return jsonResult({ path: target, ...sessionInfo(session) });
      }

      case 'save_image': {
        const { path: file } = parseArgs(PathArgs, toolName, args);
        const { current } = session;
        if (!current) {
          throw new NoCurrentImageError();
        }
        const target = resolveImagePath(config, file);
        const png = encodeRasterPng(current);
        await mkdir(path.dirname(target), { recursive: true });
        await writeFile(target, png);
        session.markSaved();
        return jsonResult({ path: target, bytes: png.length, ...sessionInfo(session) });
      }

      case 'apply_filter': {
        const { filter, ...params } = parseArgs(ApplyFilterArgs, toolName, args);
        const kind = parseFilterKind(filter);
        if (!kind) {
          return errorResult(`Unknown filter: ${filter}. Available: ${Object.values(FilterKind).join(', ')}`);
        }
        const result = await applyFilter(session, kind, params);
        return result.success ? jsonResult(sessionInfo(session)) : errorResult(result.error.message);
      }

      case 'undo': {
        const result = await undo(session);
        return result.success ? jsonResult(sessionInfo(session)) : errorResult(result.error.message);
      }

      case 'redo': {
        const result = await redo(session);
        return result.success ? jsonResult(sessionInfo(session)) : errorResult(result.error.message);
      }

      case 'reset_image': {
        const result = await reset(session);
        return result.success ? jsonResult(sessionInfo(session)) : errorResult(result.error.message);
      }

      case 'get_session_info':
        return jsonResult(sessionInfo(session));

      case 'get_histogram': {
        if (!session.current) {
          throw new NoCurrentImageError();
        }
        const { histogram } = session;
        if (!histogram) {
          return errorResult('Histogram unavailable for the current image');
        }
        return jsonResult({
          pixels: histogramTotal(histogram.blue),
          maxValue: histogram.maxValue,
          red: histogram.red,
          green: histogram.green,
          blue: histogram.blue,
        });
      }

      case 'get_preview': {
        const { current } = session;
        if (!current) {
          throw new NoCurrentImageError();
        }
        const png = encodeRasterPng(current);
        return {
          content: [
            { type: 'image', data: Buffer.from(png).toString('base64'), mimeType: 'image/png' },
            { type: 'text', text: JSON.stringify(sessionInfo(session), null, 2) },
          ],
        };
      }

      case 'list_filters':
        return jsonResult({
          filters: Object.values(FilterKind).map((kind) => ({
            name: kind,
            parametric: PARAMETRIC_FILTERS.has(kind),
            inPicker: AVAILABLE_FILTERS.includes(kind),
          })),
          defaults: DEFAULT_FILTER_PARAMETERS,
        });

      default:
        return errorResult(`Unknown tool: ${toolName}`);
    }
  } catch (e) {
    if (!(e instanceof RasterEditError) && !(e instanceof ToolArgumentError)) {
      context.logger.error(`[MCP Tools] ${toolName} failed:`, e);
    }
    return errorResult(e instanceof Error ? e.message : String(e));
  }
}

// ── Response formatters ────────────────────────────────────────

type TextContent = { type: 'text'; text: string };
type ImageContent = { type: 'image'; data: string; mimeType: string };
export type ContentItem = TextContent | ImageContent;
export type ToolResult = { content: ContentItem[]; isError?: boolean };

/** Session fields shown after every editing tool. */
function sessionInfo(session: EditSession) {
  const { current, dirty, processing, canUndo, canRedo, undoDepth, redoDepth, statusMessage } = session.getState();
  return {
    hasImage: current !== null,
    width: current?.width ?? 0,
    height: current?.height ?? 0,
    dirty,
    processing,
    canUndo,
    canRedo,
    undoDepth,
    redoDepth,
    statusMessage,
  };
}

function jsonResult(data: unknown): ToolResult {
  return { content: [{ type: 'text', text: JSON.stringify(data, null, 2) }] };
}

function errorResult(message: string): ToolResult {
  return { content: [{ type: 'text', text: `Error: ${message}` }], isError: true };
}
