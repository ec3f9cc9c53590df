interface IConstants {
	// Largest /messages limit homeservers honor in practice
	batchSize: number;
	// Most recent stored events compared against each incoming batch
	knownRecentWindow: number;
	// 1 TiB
	defaultMaxAttachmentBytes: number;
	// MongoDB caps documents at 16 MiB; larger payloads go to GridFS
	inlineAttachmentLimit: number;
	attachmentBucket: string;
	// msgtypes whose content reference gets downloaded
	attachmentMsgTypes: string[];
}

const constants: IConstants = {
	batchSize: 1000,
	knownRecentWindow: 1000,
	defaultMaxAttachmentBytes: 2 ** 40,
	inlineAttachmentLimit: 15 * 1024 * 1024,
	attachmentBucket: "attachments",
	attachmentMsgTypes: ["m.file", "m.image"]
};

export default constants;
