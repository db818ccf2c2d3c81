export type Container = 'mp4' | 'mov' | 'webm' | 'mkv' | 'image2' | 'y4m';

export type VideoCodec = 'libx264' | 'libx265' | 'libvpx-vp9' | 'prores_ks' | 'png' | 'rawvideo';

export type AudioCodec = 'aac' | 'libopus';

export interface EncoderProfileOptions {
  name?: string;
  container: Container;
  codec: VideoCodec;
  pixelFormat: string;
  crf?: number;
  preset?: string;
  /** e.g. `8M`; mutually exclusive with crf */
  bitrate?: string;
  /** Output frame rate override, used by image sequences */
  frameRate?: number;
  audioCodec?: AudioCodec;
  audioBitrate?: string;
  /** Appended verbatim after the generated codec options */
  extraArgs?: string[];
}

export interface EncoderProfileData {
  name: string;
  container: Container;
  codec: VideoCodec;
  pixelFormat: string;
  /** Whether the output keeps an alpha plane */
  alpha: boolean;
  crf: number | null;
  preset: string | null;
  bitrate: string | null;
  frameRate: number | null;
  audioCodec: AudioCodec | null;
  audioBitrate: string | null;
  extraArgs: readonly string[];
}
