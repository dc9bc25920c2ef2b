import type { Response } from '../types';
import type { ExportedDocument } from '../../export/exporter';

/**
 * Wrap a rendered document as a download.
 */
export function attachment(document: ExportedDocument): Response {
    return {
        status: 200,
        body: document.body,
        headers: {
            'Content-Type': document.contentType,
            'Content-Disposition': `attachment; filename="${document.filename}"`,
        },
    };
}
