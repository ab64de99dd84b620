import path from "node:path";

export interface ArtifactPaths {
  pages: string;
  scrapeFailures: string;
  classifiedPages: string;
  chunks: string;
  splitFailures: string;
  embeddedChunks: string;
  embedFailures: string;
  uploadFailures: string;
}

export function resolveArtifactPaths(dataDir: string, gzip: boolean): ArtifactPaths {
  const records = (name: string) => path.join(dataDir, gzip ? `${name}.jsonl.gz` : `${name}.jsonl`);
  const failures = (name: string) => path.join(dataDir, `${name}.jsonl`);

  return {
    pages: records("pages"),
    scrapeFailures: failures("scrape-failures"),
    classifiedPages: records("classified-pages"),
    chunks: records("chunks"),
    splitFailures: failures("split-failures"),
    embeddedChunks: records("embedded-chunks"),
    embedFailures: failures("embed-failures"),
    uploadFailures: failures("upload-failures"),
  };
}
