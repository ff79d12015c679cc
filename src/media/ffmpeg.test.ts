import {
  buildConcatArgs,
  buildConcatManifest,
  buildEncodeArgs,
  buildFrameFilter,
  buildMuxArgs,
  buildTextCardArgs,
} from './ffmpeg.js';

const portrait = { width: 1080, height: 1920 };

describe('buildFrameFilter', () => {
  it('fits, pads and normalises the frame', () => {
    expect(buildFrameFilter(portrait)).toBe(
      'scale=1080:1920:force_original_aspect_ratio=decrease,pad=1080:1920:(ow-iw)/2:(oh-ih)/2,setsar=1,fps=30,format=yuv420p',
    );
  });
});

describe('buildMuxArgs', () => {
  const base = { audioPath: '/w/intro.mp3', outputPath: '/w/seg_intro.mp4', frame: portrait };

  it('loops a still image for the length of the narration', () => {
    const args = buildMuxArgs({ ...base, visual: { filePath: '/w/intro.png', kind: 'image' } });
    expect(args.slice(0, 8)).toEqual(['-loop', '1', '-framerate', '30', '-i', '/w/intro.png', '-i', '/w/intro.mp3']);
    expect(args.slice(-4)).toEqual(['-shortest', '-movflags', '+faststart', '/w/seg_intro.mp4']);
  });

  it('loops a video input and keeps only its picture', () => {
    const args = buildMuxArgs({ ...base, visual: { filePath: '/w/media_0.mp4', kind: 'video' } });
    expect(args.slice(0, 6)).toEqual(['-stream_loop', '-1', '-i', '/w/media_0.mp4', '-i', '/w/intro.mp3']);
    expect(args.slice(6, 10)).toEqual(['-map', '0:v:0', '-map', '1:a:0']);
  });

  it('encodes with the shared profile', () => {
    const args = buildMuxArgs({ ...base, visual: { filePath: '/w/a.png', kind: 'image' } });
    const start = args.indexOf('-c:v');
    expect(args.slice(start, start + buildEncodeArgs().length)).toEqual([
      '-c:v', 'libx264', '-preset', 'fast', '-pix_fmt', 'yuv420p', '-r', '30',
      '-c:a', 'aac', '-b:a', '192k', '-ar', '44100', '-ac', '2',
    ]);
  });
});

describe('concat', () => {
  it('quotes every path in the manifest', () => {
    expect(buildConcatManifest(['/tmp/a.mp4', "/tmp/it's.mp4"])).toBe(
      "file '/tmp/a.mp4'\nfile '/tmp/it'\\''s.mp4'\n",
    );
  });

  it('stream-copies through the concat demuxer', () => {
    expect(buildConcatArgs('/w/list.txt', '/out/r1.mp4')).toEqual([
      '-f', 'concat', '-safe', '0', '-i', '/w/list.txt', '-c', 'copy', '-movflags', '+faststart', '/out/r1.mp4',
    ]);
  });
});

describe('buildTextCardArgs', () => {
  it('draws the label file centred on a solid card', () => {
    expect(buildTextCardArgs({ textFilePath: '/w/intro.label.txt', frame: portrait, outputPath: '/w/intro.png' })).toEqual([
      '-f', 'lavfi',
      '-i', 'color=c=0x111111:s=1080x1920',
      '-vf', "drawtext=textfile='/w/intro.label.txt':fontcolor=white:fontsize=90:x=(w-text_w)/2:y=(h-text_h)/2",
      '-frames:v', '1',
      '/w/intro.png',
    ]);
  });
});
