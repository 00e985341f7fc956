export class GetUploadStatusQuery {
    constructor(public readonly uploadId: string) { }
}
