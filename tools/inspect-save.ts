#!/usr/bin/env node

/**
 * CLI tool for inspecting save files
 * 查看存档文件的CLI工具
 *
 * Decodes and validates each file, then prints its block/record summary.
 * No component type needs to be registered.
 * 解码并校验每个文件，然后打印块与记录摘要。无需注册任何组件类型。
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import { program } from 'commander';
import chalk from 'chalk';
import { globSync, hasMagic } from 'glob';
import { decodeStream, type EncodedStream } from '../src/saveload/StreamCodec';
import { summarizeStream, type StreamSummary } from '../src/saveload/Inspect';

/**
 * Inspection result
 * 查看结果
 */
export interface InspectionResult {
  filePath: string;
  success: boolean;
  summary?: StreamSummary;
  error?: string;
}

const TEXT_EXTENSIONS = new Set(['.json']);
const BINARY_EXTENSIONS = new Set(['.msgpack', '.bin']);

/**
 * Read a save file as text or bytes, by extension
 * 按扩展名以文本或字节读取存档文件
 */
export async function readSaveFile(filePath: string): Promise<EncodedStream> {
  const ext = path.extname(filePath).toLowerCase();
  if (TEXT_EXTENSIONS.has(ext)) {
    return fs.promises.readFile(filePath, 'utf-8');
  }
  if (BINARY_EXTENSIONS.has(ext)) {
    return new Uint8Array(await fs.promises.readFile(filePath));
  }
  throw new Error(`Unsupported save file extension "${ext}" (expected .json, .msgpack or .bin)`);
}

/**
 * Expand glob patterns into absolute file paths
 * 将glob模式展开为绝对文件路径
 */
export function expandInputs(patterns: readonly string[]): string[] {
  const files = new Set<string>();
  for (const pattern of patterns) {
    if (hasMagic(pattern)) {
      globSync(pattern, { absolute: true, nodir: true }).sort().forEach(file => files.add(file));
    } else {
      files.add(path.resolve(pattern));
    }
  }
  return Array.from(files);
}

export async function inspectFile(filePath: string): Promise<InspectionResult> {
  try {
    const stream = decodeStream(await readSaveFile(filePath));
    return { filePath, success: true, summary: summarizeStream(stream) };
  } catch (error) {
    return { filePath, success: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Render one summary as printable lines
 * 将摘要渲染为可打印的行
 */
export function renderSummary(summary: StreamSummary): string[] {
  const lines = [
    chalk.gray(`   format ${summary.format}, ${summary.entityCount} entities, ${summary.totalRecords} records`)
  ];
  for (const block of summary.blocks) {
    const range = block.ordinals ? `ordinals ${block.ordinals[0]}..${block.ordinals[1]}` : 'empty';
    lines.push(`   ├── ${chalk.cyan(block.type)}: ${block.records} records (${range})`);
  }
  if (summary.bareOrdinals > 0) {
    lines.push(chalk.yellow(`   └── ${summary.bareOrdinals} entities own no listed component`));
  }
  return lines;
}

/**
 * Main program entry point
 * 主程序入口点
 */
async function main(): Promise<void> {
  program
    .name('inspect-save')
    .description('Print the block/record summary of save files')
    .version('1.0.0');

  program
    .argument('<input...>', 'Save files (.json, .msgpack, .bin; supports glob patterns)')
    .option('--json', 'Print summaries as JSON')
    .action(async (input: string[], options: { json?: boolean }) => {
      const files = expandInputs(input);
      if (files.length === 0) {
        console.log(chalk.yellow('⚠️  No input files found'));
        process.exitCode = 1;
        return;
      }

      const results: InspectionResult[] = [];
      for (const file of files) {
        results.push(await inspectFile(file));
      }

      if (options.json === true) {
        console.log(JSON.stringify(results, null, 2));
      } else {
        for (const result of results) {
          const relativePath = path.relative(process.cwd(), result.filePath);
          if (result.summary) {
            console.log(chalk.green(`✅ ${relativePath}`));
            renderSummary(result.summary).forEach(line => console.log(line));
          } else {
            console.log(chalk.red(`❌ ${relativePath}`));
            console.log(chalk.red(`   └── ${result.error ?? 'unknown error'}`));
          }
        }
      }

      process.exitCode = results.some(r => !r.success) ? 1 : 0;
    });

  program.addHelpText('after', `
Examples:
  inspect-save saves/slot1.json                 # Inspect one file
  inspect-save "saves/**/*.msgpack"             # Inspect every binary save
  inspect-save saves/slot1.json --json          # Machine-readable output
`);

  await program.parseAsync();
}

// Run the CLI tool 运行CLI工具
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  main().catch(error => {
    console.error(chalk.red('❌ Unhandled error:'), error);
    process.exit(1);
  });
}
