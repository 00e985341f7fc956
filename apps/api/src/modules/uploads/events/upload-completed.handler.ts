import { Logger } from '@nestjs/common';
import { EventsHandler, IEventHandler } from '@nestjs/cqrs';
import { UploadCompletedEvent } from '@events';

@EventsHandler(UploadCompletedEvent)
export class UploadCompletedHandler implements IEventHandler<UploadCompletedEvent> {
    private readonly logger = new Logger(UploadCompletedHandler.name);

    handle(event: UploadCompletedEvent): void {
        const { fileName, key, signature } = event.payload;
        this.logger.log(`Upload ${signature} finished: "${fileName}" stored at ${key}, handing off to cataloging`);
    }
}
