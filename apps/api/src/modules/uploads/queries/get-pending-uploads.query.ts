export class GetPendingUploadsQuery { }
