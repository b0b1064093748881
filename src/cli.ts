/**
 * @module cli
 * @description Command-line capture tool
 *
 * Usage:
 *   radar-sdk --list
 *   radar-sdk --mode point-cloud --frames 10
 *   radar-sdk --port /dev/ttyACM0 --mode object-tracking --distance-units ft --format matrix
 *
 * Frames are printed one JSON document per line on stdout.
 */

import { ValidationError, wrapError } from './core/errors';
import { ConsoleLogger, isLogLevel, type LogLevel } from './core/logging';
import { findPorts } from './transport/ports';
import {
    MODE_OBJECT_TRACKING,
    MODE_POINT_CLOUD,
    OUTPUT_LIST,
    OUTPUT_MATRIX,
    type CaptureModeValue,
    type OutputFormatValue,
} from './sensor/constants';
import type { SensorOptions } from './sensor/config';
import { RadarSensor } from './sensor/sensor';
import type { Frame } from './sensor/types';

// ==================== Argument Parsing ====================

export interface CliArgs {
    help: boolean;
    list: boolean;
    port?: string;
    mode: CaptureModeValue;
    /** Frames to capture, 0 for continuous */
    frames: number;
    frameRate?: number;
    distanceUnits?: string;
    speedUnits?: string;
    mirror: boolean;
    format: OutputFormatValue;
    logLevel: LogLevel;
}

const MODES: Record<string, CaptureModeValue> = {
    'point-cloud': MODE_POINT_CLOUD,
    'object-tracking': MODE_OBJECT_TRACKING,
};

const FORMATS: Record<string, OutputFormatValue> = {
    list: OUTPUT_LIST,
    matrix: OUTPUT_MATRIX,
};

function valueOf(argv: string[], i: number, flag: string): string {
    const value = argv[i];
    if (value === undefined || value.startsWith('--')) {
        throw new ValidationError(`Missing value for ${flag}`);
    }
    return value;
}

function integerOf(value: string, flag: string): number {
    const n = Number(value);
    if (!Number.isInteger(n)) {
        throw new ValidationError(`${flag} must be an integer`, { value });
    }
    return n;
}

/**
 * Parse command-line arguments (without the node and script paths)
 */
export function parseCliArgs(argv: string[]): CliArgs {
    const args: CliArgs = {
        help: false,
        list: false,
        mode: MODE_POINT_CLOUD,
        frames: 0,
        mirror: false,
        format: OUTPUT_LIST,
        logLevel: 'warn',
    };

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];

        if (arg === '--help' || arg === '-h') {
            args.help = true;
        } else if (arg === '--list' || arg === '-l') {
            args.list = true;
        } else if (arg === '--port' || arg === '-p') {
            args.port = valueOf(argv, ++i, arg);
        } else if (arg === '--mode' || arg === '-m') {
            const name = valueOf(argv, ++i, arg);
            const mode = MODES[name];
            if (mode === undefined) {
                throw new ValidationError(`Unknown mode: ${name}`, { choices: Object.keys(MODES) });
            }
            args.mode = mode;
        } else if (arg === '--frames' || arg === '-n') {
            args.frames = integerOf(valueOf(argv, ++i, arg), arg);
        } else if (arg === '--frame-rate') {
            args.frameRate = integerOf(valueOf(argv, ++i, arg), arg);
        } else if (arg === '--distance-units') {
            args.distanceUnits = valueOf(argv, ++i, arg);
        } else if (arg === '--speed-units') {
            args.speedUnits = valueOf(argv, ++i, arg);
        } else if (arg === '--mirror') {
            args.mirror = true;
        } else if (arg === '--format' || arg === '-f') {
            const name = valueOf(argv, ++i, arg);
            const format = FORMATS[name];
            if (format === undefined) {
                throw new ValidationError(`Unknown format: ${name}`, { choices: Object.keys(FORMATS) });
            }
            args.format = format;
        } else if (arg === '--log-level') {
            const level = valueOf(argv, ++i, arg);
            if (!isLogLevel(level)) {
                throw new ValidationError(`Unknown log level: ${level}`);
            }
            args.logLevel = level;
        } else {
            throw new ValidationError(`Unknown option: ${arg}`);
        }
    }

    return args;
}

export const HELP_TEXT = `
radar-sdk - capture frames from a radar sensor

Usage:
  radar-sdk [options]

Options:
  -h, --help               Show this help message
  -l, --list               List attached sensors and exit
  -p, --port PATH          Serial port (default: first sensor found)
  -m, --mode MODE          point-cloud | object-tracking (default: point-cloud)
  -n, --frames N           Frames to capture, 0 for continuous (default: 0)
      --frame-rate N       Frame rate in fps (0-20)
      --distance-units U   mm, cm, m, km, in, ft, mi (default: m)
      --speed-units U      mm/s, cm/s, m/s, km/h, in/s, ft/s, mi/h (default: m/s)
      --mirror             Mirror frames in the X dimension
  -f, --format FORMAT      list | matrix (default: list)
      --log-level LEVEL    debug | info | warn | error (default: warn)

Examples:
  radar-sdk --list
  radar-sdk --mode object-tracking --frames 20 --distance-units ft
`;

// ==================== Output ====================

/**
 * JSON line for a frame; matrix data becomes a plain array
 */
export function formatFrame(frame: Frame): string {
    if (frame.format === 'matrix') {
        return JSON.stringify({ ...frame, data: Array.from(frame.data) });
    }
    return JSON.stringify(frame);
}

// ==================== Main ====================

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
    /** Build the sensor; tests pass one over an in-memory transport */
    createSensor?: (options: SensorOptions) => RadarSensor;
}

const DEFAULT_IO: CliIO = {
    out: (line) => console.log(line),
    err: (line) => console.error(line),
};

/**
 * Run the CLI
 *
 * @returns Process exit code
 */
export async function runCli(argv: string[], io: CliIO = DEFAULT_IO): Promise<number> {
    let args: CliArgs;
    try {
        args = parseCliArgs(argv);
    } catch (e) {
        io.err(wrapError(e).message);
        io.err(HELP_TEXT);
        return 2;
    }

    if (args.help) {
        io.out(HELP_TEXT);
        return 0;
    }

    try {
        if (args.list) {
            for (const port of await findPorts({ allPorts: true })) {
                io.out(JSON.stringify(port));
            }
            return 0;
        }

        const options: SensorOptions = {
            port: args.port,
            outputFormat: args.format,
            logger: new ConsoleLogger(args.logLevel),
        };
        const sensor = io.createSensor ? io.createSensor(options) : new RadarSensor(options);

        const interrupt = (): void => {
            sensor.stop().catch((e: unknown) => io.err(wrapError(e).message));
        };
        process.once('SIGINT', interrupt);

        try {
            await sensor.connect();
            sensor.setUnits(args.distanceUnits, args.speedUnits);
            sensor.setMirror(args.mirror);
            await sensor.setMode(args.mode);
            if (args.frameRate !== undefined) {
                await sensor.setFrameRate(args.frameRate);
            }

            await sensor.start(args.frames);
            for await (const frame of sensor.getData()) {
                if (frame) io.out(formatFrame(frame));
            }
        } finally {
            process.removeListener('SIGINT', interrupt);
            await sensor.close();
        }

        return 0;
    } catch (e) {
        io.err(wrapError(e).message);
        return 1;
    }
}
