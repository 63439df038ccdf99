import { mkdtempSync, mkdirSync, rmSync, symlinkSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";

/** 在临时目录中按 { 相对路径: 内容 } 建立文件树，返回根目录 */
export function makeTree(files: Record<string, string>): string {
  const root = mkdtempSync(join(tmpdir(), "fluently-"));
  writeTree(root, files);
  return root;
}

export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = join(root, rel);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content, "utf8");
  }
}

/** 指向不存在目标的符号链接：无论是否以 root 运行，读取都会失败 */
export function danglingLink(root: string, rel: string): void {
  const full = join(root, rel);
  mkdirSync(dirname(full), { recursive: true });
  symlinkSync(join(root, "__missing__", rel), full);
}

export function removeTree(root: string): void {
  rmSync(root, { recursive: true, force: true });
}
