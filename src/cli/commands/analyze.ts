import * as fs from 'node:fs';
import type { Command, CommandContext } from './index.js';
import { registerCommand } from './index.js';
import type { Output, Tone } from '../output.js';
import { getStringFlag, getStringListFlag, type ParsedArgs } from '../parser.js';
import { formatValidationErrors, parseAnalyzeRequest } from '../../api/payload.js';
import { toFeedbackBody } from '../../api/response.js';
import { isRecord } from '../../config/schema.js';
import { analyzePosture, collectDeductions, type Deduction, type FeedbackResult } from '../../engine/index.js';
import { getLogger, toErrorContext } from '../../observability/logger.js';

function parseJson(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new Error(`${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Request body from `--file`, with `--metrics` replacing its metrics and
 * `--issue` values appended to its issues.
 */
export function buildRequestBody(args: ParsedArgs): Record<string, unknown> {
  let body: Record<string, unknown> = {};

  const file = getStringFlag(args, 'file');
  if (file !== undefined) {
    const parsed = parseJson(fs.readFileSync(file, 'utf-8'), file);
    if (!isRecord(parsed)) {
      throw new Error(`${file} must contain a JSON object`);
    }
    body = { ...parsed };
  }

  const metrics = getStringFlag(args, 'metrics');
  if (metrics !== undefined) {
    body['metrics'] = parseJson(metrics, '--metrics');
  }

  const issues = getStringListFlag(args, 'issue');
  if (issues.length > 0) {
    const existing = body['issues'];
    body['issues'] = Array.isArray(existing) ? [...existing, ...issues] : issues;
  }

  return body;
}

function scoreTone(score: number): Tone {
  if (score >= 85) return 'good';
  if (score >= 60) return 'warn';
  return 'bad';
}

function describeDeduction(deduction: Deduction): string {
  const subject = deduction.metric ? ` (${deduction.metric})` : '';
  return `${deduction.kind}${subject}: -${deduction.points}`;
}

function printFeedback(result: FeedbackResult, deductions: Deduction[], output: Output): void {
  const score = result.score === null
    ? 'n/a (insufficient data)'
    : output.paint(scoreTone(result.score), `${result.score}/100`);

  output.log('');
  output.log(`Posture Score: ${score}`);
  output.log(`Assessment: ${result.assessment}`);

  if (result.recommendations.length > 0) {
    output.log('');
    output.log('Recommendations:');
    output.list(result.recommendations);
  }

  if (result.score !== null && deductions.length > 0) {
    output.log('');
    output.log('Score deductions:');
    output.list(deductions.map(describeDeduction));
  }

  if (result.maintenanceTips.length > 0) {
    output.log('');
    output.log('Maintenance tips:');
    output.list(result.maintenanceTips, '•');
  }

  if (result.benefits !== null) {
    output.log('');
    output.log(result.benefits);
  }
}

const analyzeCommand: Command = {
  name: 'analyze',
  description: 'Score one set of posture metrics',
  usage: "analyze [--file <payload.json>] [--metrics '<json>'] [--issue <text>]...",
  async run(ctx: CommandContext): Promise<number> {
    let body: Record<string, unknown>;
    try {
      body = buildRequestBody(ctx.args);
    } catch (error) {
      ctx.output.error(error instanceof Error ? error.message : String(error));
      return 1;
    }

    const parsed = parseAnalyzeRequest(body);
    if (!parsed.ok) {
      ctx.output.error(`Invalid input: ${formatValidationErrors(parsed.errors)}`);
      return 1;
    }

    const { metrics, issues } = parsed.value;

    try {
      const result = analyzePosture(metrics, issues);

      if (ctx.output.isJson) {
        ctx.output.json(toFeedbackBody(result));
      } else {
        printFeedback(result, collectDeductions(metrics, issues), ctx.output);
      }
      return 0;
    } catch (error) {
      getLogger().error('Analysis failed', toErrorContext(error));
      ctx.output.error(`Internal error during analysis: ${error instanceof Error ? error.message : String(error)}`);
      return 1;
    }
  },
};

registerCommand(analyzeCommand);

export default analyzeCommand;
