export interface AudioAsset {
  fileName: string;
  localPath: string;
  publicUrl: string;
}
