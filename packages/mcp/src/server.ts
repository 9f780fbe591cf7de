// imagegate MCP server — exposes image admission checks as MCP tools.
//
// Tools:
//   image_evaluate   — full trust report: per-criterion points, CVE summary, decision
//   image_admissible — YES/NO admission check with reasoning

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import { errorMessage, formatReportJson } from '@imagegate/core';
import type { ImageGateEngine } from '@imagegate/core';
import { formatAdmissibility, formatMarkdownReport } from './format.js';

export const VERSION = '0.1.0';

const imageSchema = z
  .string()
  .min(1)
  .max(512)
  .describe(
    'Container image reference. Examples: "bitnami/redis:7.2", ' +
    '"quay.io/prometheus/node-exporter:v1.8.0", "registry.redhat.io/ubi9/ubi-minimal"',
  );

type TextResult = { content: Array<{ type: 'text'; text: string }>; isError?: boolean };

const text = (value: string): TextResult => ({ content: [{ type: 'text', text: value }] });

const failure = (image: string, err: unknown): TextResult => ({
  content: [{ type: 'text', text: `Evaluation of "${image.trim()}" failed: ${errorMessage(err)}` }],
  isError: true,
});

export function createImageGateServer(engine: ImageGateEngine): McpServer {
  const server = new McpServer(
    { name: 'imagegate', version: VERSION },
    { capabilities: { tools: {} } },
  );

  // ── Tool 1: image_evaluate ──────────────────────────────────────────────────

  server.registerTool(
    'image_evaluate',
    {
      title: 'Evaluate Container Image',
      description:
        'Score a container image for admission into the approved-registry allowlist. ' +
        'Checks vendor trust, publish recency, adoption, critical/high CVEs and cosign signature, ' +
        'and returns a 0–100 score with an auto-approve / needs-human-review / auto-reject decision.',
      inputSchema: {
        image: imageSchema,
        format: z
          .enum(['markdown', 'json'])
          .optional()
          .describe('Output format. Default: markdown'),
      },
    },
    async ({ image, format }) => {
      try {
        const report = await engine.evaluate(image);
        return text(format === 'json' ? formatReportJson(report) : formatMarkdownReport(report));
      } catch (err: unknown) {
        return failure(image, err);
      }
    },
  );

  // ── Tool 2: image_admissible ────────────────────────────────────────────────

  server.registerTool(
    'image_admissible',
    {
      title: 'Is Container Image Admissible',
      description:
        'Quick binary check before pulling or deploying an image: returns YES only when the image ' +
        'would be auto-approved. Images from vendors outside the trusted set never auto-approve.',
      inputSchema: {
        image: imageSchema,
        allow_review: z
          .boolean()
          .optional()
          .describe('Also answer YES for images that need human review. Default: false'),
      },
    },
    async ({ image, allow_review = false }) => {
      try {
        const report = await engine.evaluate(image);
        return text(formatAdmissibility(report, engine.config.thresholds, allow_review).text);
      } catch (err: unknown) {
        return failure(image, err);
      }
    },
  );

  return server;
}
