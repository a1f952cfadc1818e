import { StrictMode } from 'react'
import { createRoot } from 'react-dom/client'
import { App } from './ui/App'
import './styles.css'

const el = document.getElementById('root')
if (!el) throw new Error('#root element missing from index.html')

createRoot(el).render(
  <StrictMode>
    <App />
  </StrictMode>,
)
