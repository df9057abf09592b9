import { posix } from "node:path";

export type PathTreeFile = {
  kind: "file";
  path: string;
  name: string;
};

export type PathTreeDirectory = {
  kind: "directory";
  path: string;
  name: string;
  children: readonly PathTreeNode[];
};

export type PathTreeNode = PathTreeFile | PathTreeDirectory;

type MutableDirectory = {
  path: string;
  name: string;
  directories: Map<string, MutableDirectory>;
  files: Map<string, PathTreeFile>;
};

export const REPOSITORY_ROOT_PATH = ".";

export const normalizeTreePath = (path: string): string => {
  const normalized = posix.normalize(path.replace(/\\/g, "/")).replace(/\/+$/, "");
  return normalized.length === 0 ? REPOSITORY_ROOT_PATH : normalized;
};

const joinTreePath = (parent: string, name: string): string =>
  parent === REPOSITORY_ROOT_PATH ? name : `${parent}/${name}`;

const relativeSegments = (rootPath: string, filePath: string): readonly string[] | null => {
  if (rootPath === REPOSITORY_ROOT_PATH) {
    return filePath.split("/");
  }

  if (!filePath.startsWith(`${rootPath}/`)) {
    return null;
  }

  return filePath.slice(rootPath.length + 1).split("/");
};

const compareNodes = (left: PathTreeNode, right: PathTreeNode): number => {
  if (left.name === right.name) {
    return 0;
  }

  return left.name < right.name ? -1 : 1;
};

const freezeDirectory = (directory: MutableDirectory): PathTreeDirectory => {
  const children: PathTreeNode[] = [
    ...directory.files.values(),
    ...[...directory.directories.values()].map(freezeDirectory),
  ];
  children.sort(compareNodes);

  return {
    kind: "directory",
    path: directory.path,
    name: directory.name,
    children,
  };
};

/**
 * Arranges repository-relative file paths under `rootPath` into a directory tree
 * whose children are ordered by name. Paths outside the root are ignored. When the
 * only listed path is the root itself, the root is a file.
 */
export const buildPathTree = (rootPath: string, filePaths: readonly string[]): PathTreeNode => {
  const normalizedRoot = normalizeTreePath(rootPath);
  const rootName = posix.basename(normalizedRoot);

  if (filePaths.length === 1 && normalizeTreePath(filePaths[0] ?? "") === normalizedRoot) {
    return { kind: "file", path: normalizedRoot, name: rootName };
  }

  const root: MutableDirectory = {
    path: normalizedRoot,
    name: rootName,
    directories: new Map(),
    files: new Map(),
  };

  for (const filePath of filePaths) {
    const segments = relativeSegments(normalizedRoot, normalizeTreePath(filePath));
    if (segments === null || segments.length === 0) {
      continue;
    }

    let current = root;
    for (const segment of segments.slice(0, -1)) {
      let next = current.directories.get(segment);
      if (next === undefined) {
        next = {
          path: joinTreePath(current.path, segment),
          name: segment,
          directories: new Map(),
          files: new Map(),
        };
        current.directories.set(segment, next);
      }
      current = next;
    }

    const fileName = segments[segments.length - 1];
    if (fileName !== undefined && fileName.length > 0) {
      current.files.set(fileName, { kind: "file", path: joinTreePath(current.path, fileName), name: fileName });
    }
  }

  return freezeDirectory(root);
};

export const collectTreeFiles = (node: PathTreeNode): readonly string[] =>
  node.kind === "file" ? [node.path] : node.children.flatMap(collectTreeFiles);
