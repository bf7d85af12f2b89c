
export interface ChatMessage {
    role: 'user' | 'assistant';
    text: string;
    ts: number;
}

/**
 * What a worker or the orchestrator hands back for one user turn.
 * Serialised to the snake_case wire shape by the HTTP layer.
 */
export interface ChatReply {
    message: string;
    showUpload: boolean;
    showDownload: boolean;
    downloadFile: string | null;
    sessionEnded: boolean;
}

export interface ChatResponseBody {
    session_id: string;
    message: string;
    show_upload: boolean;
    show_download: boolean;
    download_file: string | null;
    session_ended: boolean;
}

export interface SalaryUploadResponseBody {
    success: boolean;
    message: string;
    show_download: boolean;
    download_file: string | null;
    session_ended: boolean;
}
