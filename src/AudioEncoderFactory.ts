import type { Header, StorageType } from './AudioFormat';
import type { ByteOutputStream } from './ByteStream';
import { ContainerEncoder } from './ContainerCodec/ContainerEncoder';
import { BackendUnavailableError } from './errors';
import { WavpackEncoder } from './WavpackCodec/WavpackEncoder';

export type AnyAudioEncoder = ContainerEncoder | WavpackEncoder;

/**
 * Create the encoder for header.format writing into out.
 * Only WAV and WavPack can be encoded.
 */
export function createEncoder(out: ByteOutputStream, header: Readonly<Header>, storageType: StorageType): AnyAudioEncoder {
	switch (header.format) {
		case 'wav':
			return new ContainerEncoder(out, header, storageType);
		case 'wavpack':
			return new WavpackEncoder(out, header, storageType);
		case 'mp3':
		case 'flac':
			throw new BackendUnavailableError(`No encoder available for ${header.format}`);
	}
}
