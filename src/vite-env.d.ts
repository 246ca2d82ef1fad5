/// <reference types="vite/client" />

interface ImportMetaEnv {
    readonly VITE_HIGHSCORE_KEY?: string;
    readonly VITE_SOUND?: string;
    readonly VITE_HARD_MODE?: string;
    readonly VITE_SEED?: string;
    readonly VITE_MAX_FPS?: string;
    readonly VITE_LOG_LEVEL?: string;
}
