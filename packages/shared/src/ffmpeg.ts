import { spawn } from 'child_process';
import { ok, err, Result } from 'neverthrow';
import type { ArtifactKind, LowQualitySettings, TranscodeClient } from './types';

export interface TranscodeProgress {
    fps?: number;
    speed?: string;
    time?: string;
}

// Where the preview frame is taken from, in seconds
export const PREVIEW_OFFSET_SECONDS = 1;

export const lowQualityArgs = (inputPath: string, outputPath: string, settings: LowQualitySettings): string[] => [
    '-y',
    '-i', inputPath,
    // -2 keeps the aspect ratio and rounds the height to an even number, which libx264 needs
    '-vf', `scale=${settings.width}:-2`,
    '-c:v', settings.codec,
    '-preset', settings.preset,
    '-crf', settings.crf.toString(),
    '-pix_fmt', 'yuv420p',
    '-c:a', 'aac',
    '-b:a', '128k',
    '-movflags', '+faststart',
    outputPath
];

export const previewArgs = (inputPath: string, outputPath: string): string[] => [
    '-y',
    '-ss', PREVIEW_OFFSET_SECONDS.toString(),
    '-i', inputPath,
    '-frames:v', '1',
    '-q:v', '2',
    outputPath
];

export const run = (
    executable: string,
    args: string[],
    onProgress?: (progress: TranscodeProgress) => void
): Promise<Result<void, Error>> => {
    return new Promise((resolve) => {
        const child = spawn(executable, args, {
            stdio: ['ignore', 'ignore', 'pipe'] // Ignore stdin/stdout to prevent blocking
        });

        let stderrTail = '';
        const maxTail = 5000;

        child.stderr.on('data', (data: Buffer) => {
            const chunk = data.toString();
            // Maintain a limited tail for error reporting
            stderrTail = (stderrTail + chunk).slice(-maxTail);

            const timeMatch = chunk.match(/time=(\d{2}:\d{2}:\d{2}\.\d{2})/);
            if (timeMatch) {
                const fpsMatch = chunk.match(/fps=\s*([\d.]+)/);
                const speedMatch = chunk.match(/speed=\s*([\d.]+x)/);
                onProgress?.({
                    time: timeMatch[1],
                    fps: fpsMatch ? parseFloat(fpsMatch[1]) : undefined,
                    speed: speedMatch?.[1],
                });
            }
        });

        child.on('close', (code) => {
            if (code === 0) {
                resolve(ok(undefined));
            } else {
                resolve(err(new Error(`${executable} exited with code ${code}. Stderr tail: ${stderrTail.slice(-500)}`)));
            }
        });

        child.on('error', (error) => {
            resolve(err(error));
        });
    });
};

export const version = (executable: string): Promise<Result<void, Error>> => run(executable, ['-hide_banner', '-version']);

export const createTranscodeClient = (
    executable: string,
    settings: LowQualitySettings,
    onProgress?: (progress: TranscodeProgress) => void
): TranscodeClient => ({
    available: () => version(executable),
    derive: (kind: ArtifactKind, inputPath: string, outputPath: string) => {
        switch (kind) {
            case 'low-quality': return run(executable, lowQualityArgs(inputPath, outputPath, settings), onProgress);
            case 'preview': return run(executable, previewArgs(inputPath, outputPath));
        }
    }
});

export const ffmpeg = {
    run,
    version,
    lowQualityArgs,
    previewArgs,
    createTranscodeClient
};
