import type { AudioDescriptor, OutputSpec } from "../domains/conversion/model/media.model"

export function audio(path: string, overrides: Partial<AudioDescriptor> = {}): AudioDescriptor {
  const filename = path.split("/").pop() ?? path

  return {
    path,
    filename,
    sizeBytes: 4_000_000,
    durationSeconds: 180,
    sampleRate: 44_100,
    bitrateKbps: 192,
    channels: 2,
    tags: {},
    ...overrides,
  }
}

export function outputFor(input: Pick<AudioDescriptor, "path">): OutputSpec {
  const stem = input.path.replace(/\.mp3$/i, "")

  return {
    path: `${stem}_video.mp4`,
    filename: `${stem.split("/").pop() ?? stem}_video.mp4`,
    resolution: { width: 1280, height: 720 },
    fps: 30,
    backgroundColor: "#000000",
  }
}
