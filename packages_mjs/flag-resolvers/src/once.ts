/**
 * Runs an action at most once per instance.
 */
export class Once {
    private done: boolean = false;

    public get fired(): boolean {
        return this.done;
    }

    /**
     * Run `action` if this gate has never run; otherwise do nothing.
     * The gate trips before the action runs, so a throwing action is not retried.
     */
    public do(action: () => void): void {
        if (this.done) {
            return;
        }
        this.done = true;
        action();
    }
}
