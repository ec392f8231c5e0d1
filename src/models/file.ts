export interface UploadedFile {
  fileId: number;
  fileName: string;
  originalName: string;
  storedPath: string;
  extension: string;
  sizeBytes: number;
  uploadedAt: string;
}

export interface FileChunk {
  chunkId: number;
  fileId: number;
  chunkIndex: number;
  content: string;
  overlap: number;
}

