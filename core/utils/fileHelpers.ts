/**
 * @fileoverview Utilidades de archivos: rutas parciales, escritura atómica de JSON y borrado seguro.
 * @module fileHelpers
 */

import { promises as fsPromises } from 'fs';
import path from 'path';
import config from '../config';
import { getErrorCode } from './errors';
import { logger } from './logger';

const log = logger.child('FileUtils');

/** Ruta del artefacto parcial hermano del destino final. */
export function getPartialPath(
  outputPath: string,
  suffix: string = config.downloads.partialSuffix
): string {
  return `${outputPath}${suffix}`;
}

/** Tamaño del archivo en bytes, o null si no existe. */
export async function getFileSize(filePath: string): Promise<number | null> {
  try {
    const stats = await fsPromises.stat(filePath);
    return stats.size;
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return null;
    throw error;
  }
}

export async function ensureDirectory(dirPath: string): Promise<void> {
  await fsPromises.mkdir(dirPath, { recursive: true });
}

/** JSON estable: 2 espacios y salto de línea final. */
export function serializeJSON(data: unknown): string {
  return `${JSON.stringify(data, null, 2)}\n`;
}

/**
 * Lee un archivo de texto completo. Devuelve null si no existe.
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  try {
    return await fsPromises.readFile(filePath, 'utf8');
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Escribe JSON de forma atómica: archivo temporal en el mismo directorio, fsync y rename.
 * Un lector concurrente solo ve el documento anterior o el nuevo, nunca uno a medias.
 */
export async function writeJSONAtomic(filePath: string, data: unknown): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await ensureDirectory(path.dirname(filePath));

  const handle = await fsPromises.open(tmpPath, 'w');
  try {
    await handle.writeFile(serializeJSON(data), 'utf8');
    await handle.sync();
  } finally {
    await handle.close();
  }

  try {
    await fsPromises.rename(tmpPath, filePath);
  } catch (error) {
    await safeUnlink(tmpPath);
    throw error;
  }
}

/** Renombra un archivo si existe. Devuelve false si el origen no existe. */
export async function renameIfExists(fromPath: string, toPath: string): Promise<boolean> {
  try {
    await fsPromises.rename(fromPath, toPath);
    return true;
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return false;
    throw error;
  }
}

/**
 * Elimina un archivo si existe. Devuelve true si se borró; los errores distintos
 * de ENOENT se registran y se propagan.
 */
export async function safeUnlink(filePath: string): Promise<boolean> {
  try {
    await fsPromises.unlink(filePath);
    return true;
  } catch (error) {
    if (getErrorCode(error) === 'ENOENT') return false;
    log.error('Error eliminando archivo:', {
      path: filePath,
      code: getErrorCode(error),
    });
    throw error;
  }
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';
  if (bytes < 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);

  return Math.round((bytes / Math.pow(k, i)) * 100) / 100 + ' ' + sizes[i];
}
