import { Layout } from './components/layout/Layout.js';
import { ContactPage } from './components/form/ContactPage.js';

export default function App() {
  return (
    <Layout>
      <ContactPage />
    </Layout>
  );
}
