/// <reference types="vite/client" />

/** Project-specific environment variables exposed to client code */
interface ImportMetaEnv {
    /** When set to '1' enable debug logging in app */
    readonly VITE_LOG_DEBUG?: string
}

interface ImportMeta {
    readonly env: ImportMetaEnv
}

/** Runtime configuration injected by index.html */
interface Window {
    __CFG__?: {
        /** Backend base URL, empty for same origin */
        API_URL?: string
    }
    __LOG_DEBUG?: boolean
}
