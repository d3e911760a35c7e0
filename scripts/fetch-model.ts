#!/usr/bin/env node
/**
 * @fileoverview Descarga un paquete de modelo desde la línea de comandos
 * @module scripts/fetch-model
 *
 * Uso: tsx scripts/fetch-model.ts <manifest.json> <destino> [--concurrency N] [--config archivo.json]
 *
 * El token de acceso se lee de HF_TOKEN (si existe se envía como Bearer). Ctrl-C cancela
 * de forma cooperativa: los parciales quedan en disco y la siguiente ejecución reanuda.
 * Código de salida 0 si todos los archivos quedan verificados, 1 en otro caso.
 */

import path from 'path';
import { loadConfigOverrides } from '../src/config';
import {
  DownloadCoordinator,
  type DownloadSummary,
  type ProgressEvent,
  loadManifestFile,
} from '../src/engines';
import { configureLogger } from '../src/utils';

interface CliArgs {
  manifestPath: string;
  destination: string;
  concurrency?: number;
  configPath?: string;
}

function usage(): never {
  console.error(
    'Uso: tsx scripts/fetch-model.ts <manifest.json> <destino> [--concurrency N] [--config archivo.json]'
  );
  process.exit(2);
}

function parseArgs(argv: string[]): CliArgs {
  const positional: string[] = [];
  let concurrency: number | undefined;
  let configPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--concurrency') {
      const value = Number(argv[++i]);
      if (!Number.isInteger(value) || value < 1) usage();
      concurrency = value;
    } else if (arg === '--config') {
      configPath = argv[++i];
      if (!configPath) usage();
    } else if (arg.startsWith('--')) {
      usage();
    } else {
      positional.push(arg);
    }
  }

  if (positional.length !== 2) usage();
  return {
    manifestPath: path.resolve(positional[0]),
    destination: path.resolve(positional[1]),
    concurrency,
    configPath,
  };
}

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

function printSummary(summary: DownloadSummary): void {
  console.log('');
  console.log('Resumen:');
  for (const file of summary.files) {
    const flag = file.status === 'verified' && !file.digestVerified ? ' (sin hash)' : '';
    const error = file.lastError && file.status !== 'verified' ? ` - ${file.lastError.message}` : '';
    console.log(`  ${file.status.padEnd(10)} ${file.name}${flag}${error}`);
  }
  console.log('');
  console.log(
    `  ${summary.networkRequests} peticiones, ${formatBytes(summary.bytesTransferred)} transferidos en ${(summary.durationMs / 1000).toFixed(1)}s`
  );
  if (summary.unverifiedDigests.length > 0) {
    console.log(`  Sin hash esperado: ${summary.unverifiedDigests.join(', ')}`);
  }
  if (summary.cancelled) {
    console.log('  Cancelado: los parciales se reanudarán en la próxima ejecución');
  }
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const appConfig = args.configPath
    ? await loadConfigOverrides(path.resolve(args.configPath))
    : undefined;
  if (appConfig) {
    configureLogger(appConfig.logging);
  }

  const manifest = await loadManifestFile(args.manifestPath);
  const token = process.env.HF_TOKEN?.trim();

  console.log(`Descargando ${manifest.length} archivos en ${args.destination}`);
  const coordinator = new DownloadCoordinator({ config: appConfig });
  const session = coordinator.run(manifest, {
    destinationRoot: args.destination,
    concurrency: args.concurrency,
    credentials: token ? { token } : null,
    progressThrottleMs: 500,
  });

  let interrupted = false;
  process.on('SIGINT', () => {
    if (interrupted) process.exit(130);
    interrupted = true;
    console.log('\nCancelando... (Ctrl-C otra vez para salir sin esperar)');
    session.cancel();
  });

  let lastPercent = -1;
  session.on('progress', (event: ProgressEvent) => {
    const percent = Math.floor(event.overallFraction * 100);
    if (percent !== lastPercent) {
      lastPercent = percent;
      process.stdout.write(
        `\r  ${percent}% (${formatBytes(event.confirmedBytes)} / ${formatBytes(event.totalKnownBytes)})`
      );
    }
  });

  const summary = await session.result;
  printSummary(summary);
  process.exit(summary.success ? 0 : 1);
}

main().catch(err => {
  console.error('Error:', err instanceof Error ? err.message : err);
  process.exit(1);
});
