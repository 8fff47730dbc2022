/**
 * 读取目录为 FileSet（相对路径统一用 posix 分隔符）
 */

import { readdir, readFile } from 'fs/promises'
import { join, relative, sep } from 'path'
import type { FileSet } from '../types/check.js'
import { AppError } from '../shared/error.js'
import { type Result, ok, err, fromPromise } from '../shared/result.js'

async function walk(root: string, dir: string, files: Record<string, string>): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true })
  for (const entry of entries) {
    const fullPath = join(dir, entry.name)
    if (entry.isDirectory()) {
      await walk(root, fullPath, files)
    } else if (entry.isFile()) {
      const name = relative(root, fullPath).split(sep).join('/')
      files[name] = await readFile(fullPath, 'utf-8')
    }
  }
}

export async function readFileSet(root: string): Promise<Result<FileSet, AppError>> {
  const files: Record<string, string> = {}
  const result = await fromPromise(walk(root, root, files))
  if (!result.ok) return err(AppError.evidence(`cannot read ${root}`, result.error))
  return ok(files)
}
