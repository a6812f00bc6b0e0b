import pc from 'picocolors';

export interface DoctorCheck {
  status: 'ok' | 'warn' | 'fail';
  message: string;
}

export type OutputResult =
  | { kind: 'paths'; paths: string[] }
  | { kind: 'session'; action: 'opened' | 'switched' | 'killed'; session: string }
  | { kind: 'window'; window: string; path: string }
  | { kind: 'start'; started: string[]; skipped: string[] }
  | { kind: 'doctor'; checks: DoctorCheck[] };

const DOCTOR_ICONS: Record<DoctorCheck['status'], string> = {
  ok: pc.green('✔'),
  warn: pc.yellow('!'),
  fail: pc.red('✖'),
};

/**
 * Writes command results to stdout: machine-readable with --json, one line
 * per item otherwise. Paths go out uncoloured so the output can be piped.
 */
export class OutputRenderer {
  constructor(private readonly isJson: boolean) {}

  render(data: OutputResult): void {
    if (this.isJson) {
      this.renderJson(data);
    } else {
      this.renderHuman(data);
    }
  }

  private renderJson(data: OutputResult): void {
    if (data.kind === 'paths') {
      console.log(JSON.stringify(data.paths, null, 2));
      return;
    }
    const { kind: _kind, ...rest } = data;
    console.log(JSON.stringify(rest, null, 2));
  }

  private renderHuman(data: OutputResult): void {
    switch (data.kind) {
      case 'paths':
        data.paths.forEach((p) => console.log(p));
        break;
      case 'session':
        console.log(`${pc.green('✔')} ${capitalize(data.action)} session ${pc.bold(data.session)}`);
        break;
      case 'window':
        console.log(`${pc.green('✔')} Opened window ${pc.bold(data.window)} in ${data.path}`);
        break;
      case 'start':
        data.started.forEach((name) => console.log(`${pc.green('✔')} Started session ${pc.bold(name)}`));
        data.skipped.forEach((name) => console.log(pc.yellow(`session ${name} exists`)));
        break;
      case 'doctor':
        data.checks.forEach((check) => console.log(`${DOCTOR_ICONS[check.status]} ${check.message}`));
        break;
    }
  }
}

function capitalize(word: string): string {
  return word.charAt(0).toUpperCase() + word.slice(1);
}
