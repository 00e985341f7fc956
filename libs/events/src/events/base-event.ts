export abstract class BaseEvent<T> {
    /**
     * event name
     *
     * @dev example: `upload.completed.event`
     */
    abstract readonly eventName: string;

    constructor(public readonly payload: T) { }
}
