import type { AlignmentFrame, LyricsRenderer } from '@/core/interfaces/LyricsRenderer';

const ESC = '\x1b[';
const STYLES: Record<RowStyle, string> = {
    header: `${ESC}36m`,
    past: `${ESC}90m`,
    current: `${ESC}1m`,
    next: `${ESC}2m`,
    upcoming: `${ESC}2m`,
    icon: '',
    message: `${ESC}2m`,
    warning: `${ESC}33m`,
    blank: ''
};
const RESET = `${ESC}0m`;
const SPINNER = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const NOTE = '♫';

export type RowStyle = 'header' | 'past' | 'current' | 'next' | 'upcoming' | 'icon' | 'message' | 'warning' | 'blank';

export interface LayoutRow {
    style: RowStyle;
    text: string;
}

export interface TerminalOutput {
    write(data: string): boolean;
    columns?: number;
    rows?: number;
}

/**
 * Lays out one frame as centered rows, without any escape codes. Lyrics
 * scroll in a window of at most `height` rows that keeps the active line
 * near its middle.
 */
export function layoutFrame(frame: AlignmentFrame, columns: number, height: number, spinner: string = SPINNER[0]): LayoutRow[] {
    const rows: LayoutRow[] = [];
    const center = (style: RowStyle, text: string) => rows.push({ style, text: centerText(text, columns) });
    const blank = () => rows.push({ style: 'blank', text: '' });

    if (frame.title !== undefined) {
        center('header', frame.artist ? `${frame.title} – ${frame.artist}` : frame.title);
        blank();
    }

    switch (frame.status) {
        case 'no-track':
            center('icon', NOTE);
            center('message', frame.message ?? 'Nothing playing');
            break;
        case 'resolving':
            center('message', `${spinner} Looking for lyrics...`);
            break;
        case 'not-found':
            center('icon', NOTE);
            center('message', frame.message ?? 'No lyrics found');
            break;
        case 'ready': {
            const budget = Math.max(1, height - rows.length - (frame.lowConfidence ? 2 : 0));
            const { start, end } = lyricsWindow(frame.lines.length, frame.activeIndex, budget);
            const active = frame.activeIndex;
            for (let i = start; i <= end; i++) {
                if (i === active || i < 0) {
                    center('current', frame.line.trim() || NOTE);
                } else if (i < active) {
                    center('past', frame.lines[i].trim());
                } else if (i === active + 1 && frame.next) {
                    center('next', `${frame.next.text.trim() || NOTE}  (in ${Math.ceil(frame.next.dueInSeconds)}s)`);
                } else {
                    center('upcoming', frame.lines[i].trim());
                }
            }
            if (frame.lowConfidence) {
                blank();
                center('warning', 'Timing may be off');
            }
            break;
        }
    }

    return rows;
}

/**
 * Inclusive index range of the lines to show. Before the first line the
 * range starts at -1, a placeholder row for the intro.
 */
function lyricsWindow(count: number, activeIndex: number, budget: number): { start: number; end: number } {
    const first = activeIndex < 0 || count === 0 ? -1 : 0;
    const last = Math.max(count - 1, first);
    const active = Math.min(Math.max(activeIndex, first), last);
    let start = Math.max(first, active - Math.floor((budget - 1) / 2));
    const end = Math.min(last, start + budget - 1);
    start = Math.max(first, end - budget + 1);
    return { start, end };
}

export function centerText(text: string, columns: number): string {
    const chars = Array.from(text);
    if (columns <= 0) return '';
    if (chars.length > columns) {
        return columns === 1 ? '…' : `${chars.slice(0, columns - 1).join('')}…`;
    }
    return ' '.repeat(Math.floor((columns - chars.length) / 2)) + text;
}

export interface TerminalRendererOptions {
    columns?: number;
    rows?: number;
}

/**
 * Full-screen ANSI renderer. Only redraws when what is visible changes.
 */
export class TerminalRenderer implements LyricsRenderer {
    private lastScreen?: string;
    private spinnerIndex = 0;
    private cursorHidden = false;

    constructor(
        private readonly out: TerminalOutput,
        private readonly options: TerminalRendererOptions = {}
    ) { }

    public render(frame: AlignmentFrame) {
        const columns = this.options.columns ?? this.out.columns ?? 80;
        const height = this.options.rows ?? this.out.rows ?? 24;

        let spinner = SPINNER[0];
        if (frame.status === 'resolving') {
            spinner = SPINNER[this.spinnerIndex % SPINNER.length];
            this.spinnerIndex++;
        }

        const layout = layoutFrame(frame, columns, height, spinner);
        const topPadding = Math.max(0, Math.floor((height - layout.length) / 2));
        const screen = '\n'.repeat(topPadding) + layout.map(row => styleRow(row)).join('\n');
        if (screen === this.lastScreen) return;
        this.lastScreen = screen;

        let output = '';
        if (!this.cursorHidden) {
            output += `${ESC}?25l`;
            this.cursorHidden = true;
        }
        output += `${ESC}2J${ESC}H${screen}`;
        this.out.write(output);
    }

    public close() {
        this.out.write(`${RESET}${ESC}2J${ESC}H${ESC}?25h`);
        this.cursorHidden = false;
        this.lastScreen = undefined;
    }
}

function styleRow(row: LayoutRow): string {
    const style = STYLES[row.style];
    return style ? `${style}${row.text}${RESET}` : row.text;
}
